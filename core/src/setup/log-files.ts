/**
 * Log directory preparation.
 *
 * Creates the logs directory and both log files when missing. Existing
 * files are opened in append mode only, so their content is never touched.
 */

import { existsSync } from "fs";
import { mkdir, open } from "fs/promises";
import { join, resolve } from "path";
import { skipped, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

/**
 * Create `filePath` if it does not exist. Returns true when it was created.
 */
export async function ensureLogFile(filePath: string): Promise<boolean> {
  if (existsSync(filePath)) return false;
  const handle = await open(filePath, "a");
  await handle.close();
  return true;
}

export function createLogFilesStep(): Step {
  return {
    name: "Prepare log files",
    haltsOnFailure: true,
    async run(ctx) {
      const { dir, primary, secondary } = ctx.config.logs;
      const logDir = resolve(ctx.cwd, dir);

      const createdDir = !existsSync(logDir);
      if (createdDir) {
        await mkdir(logDir, { recursive: true });
      }

      const createdFiles: string[] = [];
      for (const name of [primary, secondary]) {
        if (await ensureLogFile(join(logDir, name))) {
          createdFiles.push(name);
        }
      }

      if (createdDir) {
        return success(`Created ${dir} directory (${createdFiles.join(", ")})`);
      }
      if (createdFiles.length > 0) {
        return success(`Created ${createdFiles.join(", ")} in ${dir}/`);
      }
      return skipped(`${dir}/ and log files already exist`);
    },
  };
}
