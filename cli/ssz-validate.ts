#!/usr/bin/env -S tsx

import fs from "node:fs/promises";
import { runSszValidation } from "../tools/sszValidation";
import { SszRunConfigOverrides, type TSszRunConfigOverrides } from "@shared/ssz";

function parseArgs(): { jsonPath?: string; rawJson?: string; goldenPath?: string; reportPath?: string } {
  const args = process.argv.slice(2);
  let jsonPath: string | undefined;
  let rawJson: string | undefined;
  let goldenPath: string | undefined;
  let reportPath: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--json" && args[i + 1]) {
      jsonPath = args[i + 1];
      i += 1;
    } else if (token === "--params" && args[i + 1]) {
      rawJson = args[i + 1];
      i += 1;
    } else if (token === "--golden" && args[i + 1]) {
      goldenPath = args[i + 1];
      i += 1;
    } else if (token === "--report" && args[i + 1]) {
      reportPath = args[i + 1];
      i += 1;
    }
  }

  return { jsonPath, rawJson, goldenPath, reportPath };
}

async function loadOverrides(jsonPath?: string, rawJson?: string): Promise<TSszRunConfigOverrides | undefined> {
  let src: string | undefined;
  if (jsonPath) src = await fs.readFile(jsonPath, "utf8");
  else if (rawJson) src = rawJson;
  if (!src) return undefined;
  return SszRunConfigOverrides.parse(JSON.parse(src));
}

async function main() {
  const { jsonPath, rawJson, goldenPath, reportPath } = parseArgs();
  const overrides = await loadOverrides(jsonPath, rawJson);

  const run = await runSszValidation({ overrides, goldenPath });

  console.log(run.header);
  if (overrides) {
    console.log("Overrides:", JSON.stringify(overrides, null, 2));
  }
  console.log("");
  console.log(run.text);

  if (reportPath) {
    await fs.writeFile(reportPath, JSON.stringify(run.report, null, 2), "utf8");
    console.log(`\nReport written to ${reportPath}`);
  }
  if (!run.ok) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
