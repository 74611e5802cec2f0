export class Timer {
  private readonly start: Date;

  constructor(private readonly now = () => new Date()) {
    this.start = this.now();
  }

  public humanReadableElapsed(): string {
    const elapsedSeconds = Math.floor(this.elapsedMs() / 1000);
    return Timer.humanReadableElapsedMinutes(elapsedSeconds) + Timer.humanReadableElapsedSeconds(elapsedSeconds);
  }

  public elapsedMs(): number {
    return this.now().getTime() - this.start.getTime();
  }

  private static humanReadableElapsedSeconds(elapsedSeconds: number) {
    const restSeconds = elapsedSeconds % 60;
    return restSeconds === 1 ? `${restSeconds} second` : `${restSeconds} seconds`;
  }

  private static humanReadableElapsedMinutes(elapsedSeconds: number) {
    const elapsedMinutes = Math.floor(elapsedSeconds / 60);
    if (elapsedMinutes > 1) {
      return `${elapsedMinutes} minutes `;
    }
    if (elapsedMinutes === 1) {
      return `${elapsedMinutes} minute `;
    }
    return '';
  }
}
