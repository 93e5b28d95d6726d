/** Checked in order; the first non-empty value wins. */
export const API_KEY_SOURCES = ["CMDFOR_OPENAI_API_KEY", "OPENAI_API_KEY"] as const;

export type Env = Readonly<Record<string, string | undefined>>;

export function resolveApiKey(env: Env): string | undefined {
  for (const name of API_KEY_SOURCES) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}
