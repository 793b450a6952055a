// Console guidance, gated by `config.warnings`.
const seen = new Set<string>();

export function warn(enabled: boolean, message: string) {
  if (!enabled) return;
  // eslint-disable-next-line no-console
  console.warn(message);
}

/** Warn at most once per `key` for the lifetime of the process (or until reset). */
export function onceWarn(enabled: boolean, key: string, message: string) {
  if (!enabled || seen.has(key)) return;
  warn(enabled, message);
  seen.add(key);
}

/** Forget which keys already warned. Intended for test harness cleanup. */
export function resetWarnings() {
  seen.clear();
}
