import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { CONFIG_FILE, snippetsConfigSchema } from "../../config/schema.js";
import { generateDefaultConfig } from "../../config/writer.js";

export class InitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InitError";
  }
}

export interface InitOptions {
  cwd: string;
  force?: boolean;
  dir?: string;
  extension?: string;
}

export async function runInit(opts: InitOptions): Promise<string> {
  const configPath = join(opts.cwd, CONFIG_FILE);
  if (existsSync(configPath) && !opts.force) {
    throw new InitError(`${CONFIG_FILE} already exists. Use --force to overwrite.`);
  }

  const checked = snippetsConfigSchema.safeParse({ dir: opts.dir, extension: opts.extension });
  if (!checked.success) {
    const issues = checked.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new InitError(`Invalid options:\n${issues}`);
  }

  await writeFile(
    configPath,
    generateDefaultConfig({ dir: checked.data.dir, extension: checked.data.extension }),
    "utf-8",
  );
  return configPath;
}

export default async function init(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      force: { type: "boolean" },
      dir: { type: "string" },
      extension: { type: "string" },
    },
    strict: true,
  });

  try {
    const configPath = await runInit({
      cwd: resolve("."),
      force: values.force,
      dir: values.dir,
      extension: values.extension,
    });
    console.log(chalk.green(`Created ${configPath}`));
  } catch (err) {
    if (err instanceof InitError) {
      console.error(chalk.red(err.message));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
