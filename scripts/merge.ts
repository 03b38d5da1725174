/**
 * Merge dashcam clips into one file per date and camera.
 *
 * Run:
 *   npm run merge                          # every date found
 *   npm run merge -- -d 20250906           # one date only
 *   npm run merge -- -c config/custom.json --no-info
 */
import dotenv from "dotenv";
dotenv.config();

import { readFileSync } from "fs";
import { parseArgs } from "util";
import { z } from "zod";
import { loadConfig } from "../src/lib/config/load";
import type { AppConfig } from "../src/lib/config/schema";
import { describeError, isMergeError } from "../src/lib/utils/errors";
import { log } from "../src/lib/utils/logger";
import { runMerge } from "../src/workers/merge-processor";

const USAGE = `Usage: npm run merge -- [options]

Options:
  -c, --config <path>   configuration file (default: config/config.json)
  -d, --date <YYYYMMDD> merge a single capture date
      --no-info         skip the per-group file summary
      --no-progress     skip the live progress display
  -v, --version         print the version
  -h, --help            print this help
`;

const dateSchema = z.string().regex(/^\d{8}$/, "date must be 8 digits (YYYYMMDD), e.g. 20250906");

function readVersion(): string {
  const pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return z.object({ version: z.string() }).parse(pkg).version;
}

function parseCli() {
  return parseArgs({
    options: {
      config: { type: "string", short: "c" },
      date: { type: "string", short: "d" },
      "no-info": { type: "boolean", default: false },
      "no-progress": { type: "boolean", default: false },
      version: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  }).values;
}

async function main(): Promise<number> {
  let values: ReturnType<typeof parseCli>;
  try {
    values = parseCli();
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 1;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (values.version) {
    console.log(`dashcam-merger ${readVersion()}`);
    return 0;
  }

  let targetDate: string | undefined;
  if (values.date !== undefined) {
    const parsed = dateSchema.safeParse(values.date);
    if (!parsed.success) {
      console.error(parsed.error.issues.map((issue) => issue.message).join("; "));
      return 1;
    }
    targetDate = parsed.data;
  }

  let config: AppConfig;
  try {
    config = await loadConfig(values.config);
  } catch (error) {
    if (isMergeError(error, "ConfigInvalid")) {
      log("error", "config", undefined, error.message);
      return 1;
    }
    throw error;
  }

  // A finished run exits 0 even when some groups failed; the summary says which.
  await runMerge(config, {
    targetDate,
    showInfo: !values["no-info"],
    showProgress: !values["no-progress"],
  });
  return 0;
}

process.on("SIGINT", () => {
  console.error("\nInterrupted");
  process.exit(1);
});

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    log("error", "run", undefined, `Unexpected failure: ${describeError(error)}`);
    process.exit(1);
  });
