import yaml from 'js-yaml';

/**
 * Render a config value for terminal output: scalars as-is, structures as YAML.
 */
export function formatConfigValue(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }
  if (typeof value === 'object') {
    return yaml.dump(value, { indent: 2 }).trimEnd();
  }
  return String(value);
}

/**
 * Call `onSignal` once for the first SIGINT or SIGTERM. Returns a function
 * that removes the handlers.
 */
export function onTerminationSignal(onSignal: (signal: NodeJS.Signals) => void): () => void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let fired = false;

  const handler = (signal: NodeJS.Signals): void => {
    if (fired) {
      return;
    }
    fired = true;
    onSignal(signal);
  };

  for (const signal of signals) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };
}

