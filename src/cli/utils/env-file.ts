/**
 * Set variables in `.env` content, keeping every other line as it is.
 * Existing assignments are replaced in place, new ones are appended.
 */
export function upsertEnvValues(
  content: string,
  values: Record<string, string>
): string {
  const pending = new Map(Object.entries(values));
  const lines = content === "" ? [] : content.replace(/\n$/, "").split("\n");

  const updated = lines.map((line) => {
    const match = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/.exec(line);
    const key = match?.[1];

    if (key === undefined || !pending.has(key)) {
      return line;
    }

    const value = pending.get(key) ?? "";
    pending.delete(key);
    return `${key}=${value}`;
  });

  for (const [key, value] of pending) {
    updated.push(`${key}=${value}`);
  }

  return `${updated.join("\n")}\n`;
}
