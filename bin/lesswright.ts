#!/usr/bin/env node

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { hideBin } from "yargs/helpers";
import { runCli } from "../src/cli.ts";

// In built version, we need to go up from dist to project root
const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : undefined;

process.exitCode = await runCli(hideBin(process.argv), { version });
