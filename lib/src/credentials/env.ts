/**
 * Reads API keys from the environment.
 *
 * Order: `<PREFIX>_1`, `<PREFIX>_2`, ... by number, then the comma-separated
 * `<PREFIX>S`, then the bare `<PREFIX>`. Duplicates keep their first position.
 */
export function collectCredentialsFromEnv(
  env: Readonly<Record<string, string | undefined>>,
  prefix: string
): string[] {
  const numbered: Array<{ n: number; value: string }> = [];
  const pattern = new RegExp(`^${escapeRegExp(prefix)}_(\\d+)$`);

  for (const [name, value] of Object.entries(env)) {
    const match = pattern.exec(name);
    if (match?.[1] !== undefined && value !== undefined) {
      numbered.push({ n: Number.parseInt(match[1], 10), value });
    }
  }
  numbered.sort((a, b) => a.n - b.n);

  const candidates = [
    ...numbered.map((entry) => entry.value),
    ...(env[`${prefix}S`] ?? '').split(','),
    env[prefix] ?? '',
  ];

  const keys: string[] = [];
  for (const candidate of candidates) {
    const key = candidate.trim();
    if (key.length > 0 && !keys.includes(key)) {
      keys.push(key);
    }
  }
  return keys;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
