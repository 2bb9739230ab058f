export function parseLineList(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Reads the `dependencies` map of `npm list --json` (an object) or
 * `pnpm ls --json` (an array of such objects) into `name@version` entries.
 * Empty or malformed output gives an empty list.
 */
export function parseJsonPackageList(output: string): string[] {
  if (!output.trim()) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return [];
  }

  const roots = Array.isArray(parsed) ? parsed : [parsed];
  const packages: string[] = [];
  for (const root of roots) {
    if (!isRecord(root) || !isRecord(root.dependencies)) {
      continue;
    }
    for (const [name, info] of Object.entries(root.dependencies)) {
      const version =
        isRecord(info) && typeof info.version === "string"
          ? info.version
          : undefined;
      packages.push(version ? `${name}@${version}` : name);
    }
  }

  return [...new Set(packages)];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
