// Fit Omori-Utsu decay to every aftershock sequence in a catalog export.
// Run with: npx tsx scripts/analyze-catalog.ts --catalog usgs-2020-2025.geojson [--out dir] [--min-mag 6.5]
// Relative catalog paths resolve under $DATA_ROOT/catalog.

import "./_loadEnv";
import { EventStore } from "@/lib/catalog/eventStore";
import { configFromEnv, resolveConfig, validateConfig } from "@/lib/omori/config";
import { analyzeCatalog } from "@/lib/omori/analyzer";
import { formatFitLine, formatSequenceHeader, formatSummary, RULE } from "@/lib/omori/report";
import { loadCatalogFile, saveAnalysis, saveSequenceSummaryCsv } from "@/lib/storage/analysisStore";
import { catalogFileFor, RESULTS_DIR } from "@/lib/paths";
import { parseAnalyzeArgs } from "./_utils/cli";

async function main() {
  const args = parseAnalyzeArgs(process.argv.slice(2));
  if (!args.catalog) {
    console.error("Usage: analyze-catalog --catalog <file.geojson|file.csv> [--out dir] [--min-mag M]");
    process.exitCode = 1;
    return;
  }

  const config = validateConfig(
    resolveConfig({
      ...configFromEnv(),
      ...(args.minMagnitude !== null ? { minMainshockMagnitude: args.minMagnitude } : {}),
    })
  );

  console.log(RULE);
  console.log("OMORI'S LAW ANALYSIS");
  console.log(RULE);

  const catalogPath = catalogFileFor(args.catalog);
  const { events, skipped } = await loadCatalogFile(catalogPath);
  if (skipped > 0) {
    console.warn(`Skipped ${skipped} catalog entries without usable time, position or magnitude`);
  }
  const store = new EventStore(events);
  console.log(`Loaded ${store.size} events from ${catalogPath}`);

  const { results, summary } = analyzeCatalog(store, config, {
    onResult: (result, index, total) => {
      console.log(`\n${formatSequenceHeader(result, index, total)}`);
      const line = formatFitLine(result);
      if (result.success) console.log(line);
      else console.warn(line);
    },
  });

  const outDir = args.outDir ?? RESULTS_DIR;
  const resultsPath = await saveAnalysis({ config, summary, results }, outDir);
  const csvPath = await saveSequenceSummaryCsv(results, outDir);
  console.log(`\nResults saved to: ${resultsPath}`);
  console.log(`Summary CSV saved to: ${csvPath}`);

  console.log("");
  for (const line of formatSummary(summary, config.fitSuccessThreshold)) {
    console.log(line);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
