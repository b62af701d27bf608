// Runtime debug switches, read from the environment once per emulator.
//   EMU_TRACE=1          log every executed instruction
//   EMU_TRACE_LIMIT=<n>  stop tracing after n instructions

export interface EmulatorConfig {
  trace: boolean;
  traceLimit: number; // Infinity when unset
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: EmulatorConfig = { trace: false, traceLimit: Infinity };

export function readEmulatorConfig(env: Env = typeof process !== 'undefined' ? process.env : {}): EmulatorConfig {
  const trace = env.EMU_TRACE === '1';
  const rawLimit = env.EMU_TRACE_LIMIT;
  const traceLimit = rawLimit && /^\d+$/.test(rawLimit) ? parseInt(rawLimit, 10) : Infinity;
  return { trace, traceLimit };
}
