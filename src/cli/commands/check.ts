import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, withOverrides } from '../../core/config/loader.js';
import { discoverAddons, resolveAddonDirs } from '../../core/module/discovery.js';
import { buildCoverageReport, computeMetrics, formatMetricsLine } from '../../core/report/coverage.js';
import { ChangedFilesDetector } from '../../core/scope/changed-files.js';
import type { ExecutionContext } from '../../core/scope/context.js';
import { ScopeFilter } from '../../core/scope/filter.js';
import { LintEngine } from '../../core/validation/engine.js';
import { extractorRegistry } from '../../validators/extractor-registry.js';
import { writeFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createFormatter, getExitCode, issueCounts, parseCheckOptions } from './check-helpers.js';

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check Odoo add-ons for errors and style problems')
    .argument('[paths...]', 'Add-on directories or files inside add-ons (default: every add-on below the cwd)')
    .option('--format <format>', 'Output format: human, json, or compact', 'human')
    .option('--config <path>', 'Path to config file')
    .option('--scope <scope>', 'Validation scope: changed or full')
    .option('--context <context>', 'Execution context: auto, local, or ci')
    .option('--base-branch <ref>', 'Reference to diff against in CI')
    .option('--only <language>', 'Only run checks for one language: python, xml, csv, po, or manifest')
    .option('--metrics', 'Print the METRICS line with documentation coverage')
    .option('--report <file>', 'Write the JSON coverage report to a file')
    .option('--max-messages <n>', 'Show at most this many findings per check and add-on')
    .option('--errors-only', 'Only show errors in output (still runs all checks)')
    .option('--verbose', 'Show detailed output')
    .option('--quiet', 'Suppress non-essential output')
    .action(async (paths: string[], rawOptions: unknown) => {
      try {
        const options = parseCheckOptions(rawOptions);
        if (options.verbose) {
          logger.setLevel('debug');
        } else if (options.quiet) {
          logger.setLevel('silent');
        }

        const cwd = process.cwd();
        const config = withOverrides(await loadConfig(cwd, options.config), {
          validationScope: options.scope,
          context: options.context,
          baseBranch: options.baseBranch,
        });

        const dirs = paths.length > 0 ? await resolveAddonDirs(paths, cwd) : await discoverAddons(cwd);
        if (dirs.length === 0) {
          logger.warn(paths.length > 0 ? 'None of the given paths is inside an add-on' : `No add-ons found below ${cwd}`);
        }
        logger.debug(`Checking ${dirs.length} add-on(s)`);

        let scopeFilter = ScopeFilter.full();
        let context: ExecutionContext | null = null;
        if (config.validationScope === 'changed') {
          const detector = new ChangedFilesDetector({
            cwd,
            context: config.context,
            baseBranch: config.baseBranch,
          });
          const changed = await detector.detect();
          scopeFilter = new ScopeFilter('changed', changed.files);
          context = changed.context;
          logger.debug(
            `${changed.files.size} changed file(s) in ${changed.context} context` +
              (changed.baseRef ? ` against ${changed.baseRef}` : '')
          );
        }

        const engine = new LintEngine(config, scopeFilter, context);
        const { result, addons } = await engine.run(dirs, {
          languages: options.only ? new Set([options.only]) : undefined,
        });

        const formatter = createFormatter({
          format: options.format,
          colors: process.stdout.isTTY === true,
          verbose: options.verbose,
          errorsOnly: options.errorsOnly,
          maxMessages: options.maxMessages ?? null,
          cwd,
        });
        console.log(formatter.formatBatch(result));

        if (options.metrics) {
          console.log(formatMetricsLine(computeMetrics(addons, config)));
        }

        if (options.report) {
          const reportPath = path.resolve(cwd, options.report);
          const report = buildCoverageReport(addons, issueCounts(result), config);
          try {
            await writeFile(reportPath, JSON.stringify(report, null, 2));
            logger.success(`Coverage report written to ${reportPath}`);
          } catch (error) {
            logger.warn(`Could not write coverage report to ${reportPath}: ${errorMessage(error)}`);
          }
        }

        extractorRegistry.disposeAll();
        process.exit(getExitCode(result));
      } catch (error) {
        logger.error('Check failed', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}
