/**
 * Config file materialization: copy the template to the active config file
 * on first run, never overwrite afterwards.
 */

import { constants, existsSync } from "fs";
import { copyFile } from "fs/promises";
import { resolve } from "path";
import { isAlreadyExistsError, isPermissionError } from "../logging/error-utils.js";
import { failed, skipped, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

export function createEnvFileStep(): Step {
  return {
    name: "Create config file",
    haltsOnFailure: true,
    async run(ctx) {
      const { path: envPath, template } = ctx.config.envFile;
      const target = resolve(ctx.cwd, envPath);
      const source = resolve(ctx.cwd, template);

      if (existsSync(target)) {
        return skipped(`${envPath} file already exists`);
      }

      ctx.reporter.info(`Creating ${envPath} file from template...`);
      if (!existsSync(source)) {
        return failed(`${template} not found`);
      }

      try {
        await copyFile(source, target, constants.COPYFILE_EXCL);
      } catch (err) {
        if (isAlreadyExistsError(err)) {
          return skipped(`${envPath} file already exists`);
        }
        if (isPermissionError(err)) {
          return failed(`Permission denied writing ${envPath}`);
        }
        throw err;
      }

      ctx.reporter.warn(`Please edit ${envPath} and add your API keys`);
      return success(`${envPath} file created from ${template}`);
    },
  };
}
