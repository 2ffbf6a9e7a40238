import { Command } from 'commander';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { findUpSync, readFileSync } from '../utils/file-system.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const file = findUpSync(dirname(fileURLToPath(import.meta.url)), 'package.json');
  if (!file) return '0.0.0';
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(file)));
  return parsed.success ? parsed.data.version : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('addonlint')
    .description('Static checks for Odoo add-on modules')
    .version(readVersion());
  program.addCommand(createCheckCommand(), { isDefault: true });
  return program;
}
