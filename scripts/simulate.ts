import { parseSimulateArgs } from "../src/utils/cliArgs.js";
import { runTokenomicsSimulation } from "../src/core/tokenomics.js";
import { formatPeriodTable, formatSummaryLines } from "../src/report/table.js";
import { postSimulationCheck, preSimulationCheck } from "../src/risk/checks.js";
import { toParameterSet } from "../src/schema.js";

const parsed = parseSimulateArgs(process.argv.slice(2));

if (!parsed.ok) {
  console.error("Invalid parameters:");
  for (const issue of parsed.issues) {
    console.error(`   ${issue}`);
  }
  process.exit(1);
}

const params = toParameterSet(parsed.options.input);

const pre = preSimulationCheck(params);
if (!pre.ok) {
  console.error(`Invalid parameters: ${pre.reasons.join(", ")}`);
  process.exit(1);
}

const { result, records } = runTokenomicsSimulation(params);

const post = postSimulationCheck(records);
if (!post.ok) {
  console.warn(
    JSON.stringify({
      event: "simulation_unhealthy",
      timestamp: new Date().toISOString(),
      reasons: post.reasons,
    }),
  );
}

if (parsed.options.json) {
  console.log(JSON.stringify(result, null, 2));
} else {
  for (const line of formatSummaryLines(result.summary)) {
    console.log(line);
  }
  console.table(formatPeriodTable(records));
  console.log(`Provenance: ${result.receipt.provenance_hash}`);
}
