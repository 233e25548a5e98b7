/**
 * Operating modes and the graph of transitions between them.
 *
 * NORMAL is the startup mode. Every escalated mode has a path back to NORMAL,
 * LOCKDOWN only through RECOVERY.
 */
export enum Mode {
  NORMAL = 'NORMAL',
  ALERT = 'ALERT',
  DEGRADED = 'DEGRADED',
  LOCKDOWN = 'LOCKDOWN',
  RECOVERY = 'RECOVERY',
}

export const ALL_MODES: readonly Mode[] = [
  Mode.NORMAL,
  Mode.ALERT,
  Mode.DEGRADED,
  Mode.LOCKDOWN,
  Mode.RECOVERY,
];

export const INITIAL_MODE = Mode.NORMAL;

const ALLOWED_TRANSITIONS: Readonly<Record<Mode, readonly Mode[]>> = {
  [Mode.NORMAL]: [Mode.ALERT, Mode.DEGRADED],
  [Mode.ALERT]: [Mode.NORMAL, Mode.DEGRADED, Mode.LOCKDOWN],
  [Mode.DEGRADED]: [Mode.LOCKDOWN, Mode.RECOVERY],
  [Mode.LOCKDOWN]: [Mode.RECOVERY],
  [Mode.RECOVERY]: [Mode.NORMAL, Mode.LOCKDOWN],
};

export function isTransitionAllowed(from: Mode, to: Mode): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function allowedTargets(from: Mode): readonly Mode[] {
  return ALLOWED_TRANSITIONS[from];
}

export function isMode(value: unknown): value is Mode {
  return typeof value === 'string' && ALL_MODES.some((mode) => mode === value);
}
