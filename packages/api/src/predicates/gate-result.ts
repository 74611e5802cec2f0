export type GateResult = ClosedGate | OpenGate;

/**
 * The condition holds, the entry may proceed.
 */
export interface OpenGate {
  gate: true;
}

export interface ClosedGate {
  gate: false;
  reason: string;
}

export function openGate(): OpenGate {
  return { gate: true };
}

export function closedGate(reason: string): ClosedGate {
  return { gate: false, reason };
}
