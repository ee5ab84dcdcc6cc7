/**
 * Version constants
 *
 * Read from package.json so the report and the package never disagree.
 *
 * @module version
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

const PackageJsonSchema = z.object({
  version: z.string().min(1),
});

const packageJson = PackageJsonSchema.parse(
  JSON.parse(fs.readFileSync(fileURLToPath(new URL("../../package.json", import.meta.url)), "utf8")),
);

/** Name written into every report's `tool` field */
export const TOOL_NAME = "TruthScan";

export const APP_VERSION = packageJson.version;
