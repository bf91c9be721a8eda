export type BackorderPolicy = {
  enableBackorders: boolean;
  allocationTimeoutMs: number;
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

export function getBackorderPolicy(env: NodeJS.ProcessEnv = process.env): BackorderPolicy {
  const timeout = Number(env.ALLOCATION_TIMEOUT_MS ?? 10000);
  return {
    enableBackorders: parseBoolean(env.ENABLE_BACKORDERS, true),
    allocationTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : 10000
  };
}
