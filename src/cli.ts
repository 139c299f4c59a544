#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs";
import { loadConfig } from "./config/loadConfig.js";
import { parseArgs } from "./config/parseArgs.js";
import { parseEvent } from "./parser/eventParser.js";
import { buildPreview } from "./preview/buildPreview.js";

function readInput(source: string | undefined): string {
  if (!source || source === "-") {
    return fs.readFileSync(process.stdin.fd, "utf8");
  }
  return fs.readFileSync(source, "utf8");
}

async function run() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig({ format: args.format, verify: args.verify });
  if (!config.verify_signatures) {
    console.warn("Signature verification is disabled");
  }

  const event = parseEvent(readInput(args.event), { verify: config.verify_signatures });
  const preview = buildPreview(event, {
    code: args.code,
    headers: { "user-agent": args.userAgent, accept: args.accept },
    config
  });

  if (config.output.format === "html") {
    process.stdout.write(preview.content + "\n");
  } else {
    process.stdout.write(JSON.stringify(preview, null, 2) + "\n");
  }
}

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
