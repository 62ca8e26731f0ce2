export interface AppEnv {
  /** Undefined leaves the access gate open. */
  accessPassphrase?: string;
}

export function getAppEnv(): AppEnv {
  const passphrase = import.meta.env.VITE_ACCESS_PASSPHRASE;
  return { accessPassphrase: passphrase ? passphrase : undefined };
}

export function checkPassphrase(input: string, expected: string | undefined): boolean {
  if (expected === undefined) return true;
  return input === expected;
}
