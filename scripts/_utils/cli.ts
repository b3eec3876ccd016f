export type AnalyzeArgs = {
  catalog: string | null;
  outDir: string | null;
  minMagnitude: number | null;
};

// --name=value or --name value
function readFlag(argv: string[], name: string): string | null {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(`--${name}=`)) {
      return arg.slice(name.length + 3);
    }
    if (arg === `--${name}`) {
      return argv[i + 1] ?? "";
    }
  }
  return null;
}

export function parseAnalyzeArgs(argv: string[]): AnalyzeArgs {
  const positional = argv.filter((a, i) => !a.startsWith("--") && !(i > 0 && /^--(catalog|out|min-mag)$/.test(argv[i - 1])));

  const catalog = readFlag(argv, "catalog") ?? positional[0] ?? null;
  const outDir = readFlag(argv, "out");
  const minMagRaw = readFlag(argv, "min-mag");

  let minMagnitude: number | null = null;
  if (minMagRaw !== null) {
    minMagnitude = Number(minMagRaw);
    if (minMagRaw.trim() === "" || !Number.isFinite(minMagnitude)) {
      throw new Error(`--min-mag expects a number (got "${minMagRaw}")`);
    }
  }

  return {
    catalog: catalog && catalog.trim() !== "" ? catalog.trim() : null,
    outDir: outDir && outDir.trim() !== "" ? outDir.trim() : null,
    minMagnitude,
  };
}
