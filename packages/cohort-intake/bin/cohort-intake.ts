#!/usr/bin/env tsx
/**
 * Cohort Intake CLI Entry Point
 *
 * Local file checks (validate, combine) and cohort operations against the
 * configured database and object store.
 *
 * @module cohort-intake-cli
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { config as loadEnv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { ConfigError, DuplicateFileTypeError, UploadRejectedError, errorMessage } from '../src/core/errors.js';
import { loadConfig, type IntakeConfig } from '../src/core/config.js';
import { FILE_FAMILIES, type FileFamily } from '../src/core/types/file-types.js';
import { combineFilesCommand } from '../src/cli/commands/combine-files.js';
import {
  deleteCohortCommand,
  deleteFileCommand,
  downloadFileCommand,
  listCohortsCommand,
  showCohortCommand,
  uploadFileCommand,
  upsertCohortCommand,
  validateCohortCommand,
} from '../src/cli/commands/cohort.js';
import {
  addPhenotypeCommand,
  deletePhenotypeCommand,
  listPhenotypesCommand,
  phenotypeTotalsCommand,
  seedPhenotypesCommand,
} from '../src/cli/commands/phenotypes.js';
import { validateFileCommand } from '../src/cli/commands/validate-file.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../src/cli/lib/exit-codes.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { formatJson, formatTable } from '../src/cli/lib/output.js';
import { withServices } from '../src/cli/lib/services.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  database?: string;
  storage?: string;
}

interface GlobalContext {
  config: IntakeConfig;
  logger: CLILogger;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

function initializeContext(options: GlobalOptions): GlobalContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      databaseUrl: options.database,
      storageRoot: options.storage,
      logLevel: options.verbose ? 'debug' : undefined,
      json: options.json,
    },
  });

  const logger = createCLILogger({ level: config.logging.level, json: config.logging.json });
  globalContext = { config, logger };
  return globalContext;
}

// ============================================================================
// Helpers
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    console.error(`Could not read version from ${packageJsonPath}: ${errorMessage(error)}`);
    return '0.0.0';
  }
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function familyOption(): Option {
  return new Option('--family <family>', 'File family').choices([...FILE_FAMILIES]).makeOptionMandatory();
}

function print(data: unknown, human: string): void {
  const { config } = getGlobalContext();
  console.log(config.logging.json ? formatJson(data) : human);
}

function exitCodeForError(error: unknown): ExitCode {
  return error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}

/**
 * Run a command body, log its outcome and set the process exit code.
 */
async function runAction(name: string, body: (context: GlobalContext) => Promise<ExitCode>): Promise<void> {
  const context = getGlobalContext();
  context.logger.commandStart(name);
  try {
    const code = await body(context);
    context.logger.commandEnd(code !== EXIT_CODES.ERRORS, { exitCode: code });
    process.exitCode = code;
  } catch (error) {
    if (error instanceof UploadRejectedError) {
      print({ error: error.validationError, warning: error.warning }, `Rejected: ${error.validationError}`);
    } else if (error instanceof DuplicateFileTypeError) {
      print({ error: error.message }, error.message);
    } else {
      context.logger.error(errorMessage(error));
    }
    const code = exitCodeForError(error);
    context.logger.commandEnd(false, { exitCode: code });
    process.exitCode = code;
  }
}

// ============================================================================
// CLI Setup
// ============================================================================

function createProgram(): Command {
  const program = new Command();

  program
    .name('cohort-intake')
    .description('Validate, combine and check consortium cohort files')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .cohort-intakerc)')
    .option('--database <url>', 'Database URL (sqlite:///path or postgresql://...)')
    .option('--storage <dir>', 'Object storage root directory')
    .hook('preAction', (thisCommand) => {
      try {
        initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  // ==========================================================================
  // Local file commands
  // ==========================================================================

  program
    .command('validate <file>')
    .description('Validate a cases/controls or co-occurrence file')
    .addOption(familyOption())
    .option('--mapping <json>', 'Column mapping as JSON (canonical role -> header)')
    .option('--phenotypes <file>', 'Phenotype definitions JSON (default: bundled list)')
    .action(async (file: string, options: { family: FileFamily; mapping?: string; phenotypes?: string }) => {
      await runAction('validate', async () => {
        const report = await validateFileCommand({ file, ...options });
        const lines = [
          `${report.file}: ${report.rowCount} rows, columns ${report.columns.join(', ')}`,
          report.error === null ? 'Valid' : `Error: ${report.error}`,
          ...(report.warning === null ? [] : [`Warning: ${report.warning}`]),
        ];
        print(report, lines.join('\n'));
        return exitCodeFor(report);
      });
    });

  program
    .command('combine <male> <female>')
    .description('Combine a male and a female file into the both table (TSV)')
    .addOption(familyOption())
    .option('--male-mapping <json>', 'Column mapping of the male file')
    .option('--female-mapping <json>', 'Column mapping of the female file')
    .option('--out <file>', 'Write the combined TSV here instead of stdout')
    .action(
      async (
        male: string,
        female: string,
        options: { family: FileFamily; maleMapping?: string; femaleMapping?: string; out?: string }
      ) => {
        await runAction('combine', async ({ logger }) => {
          const report = await combineFilesCommand({ male, female, ...options });
          if (report.output === null) {
            process.stdout.write(report.tsv);
          } else {
            logger.info(`Wrote ${report.rowCount} rows`, { output: report.output });
          }
          return EXIT_CODES.SUCCESS;
        });
      }
    );

  // ==========================================================================
  // Cohort commands
  // ==========================================================================

  const cohort = program.command('cohort').description('Cohort records and files');

  cohort
    .command('upsert')
    .description('Create a cohort, or update the one with the same name and uploader')
    .requiredOption('--name <name>', 'Cohort name')
    .requiredOption('--uploaded-by <user>', 'Uploader')
    .option('--total-sample-size <n>', 'Declared total sample size', parseCount)
    .option('--males <n>', 'Declared number of males', parseCount)
    .option('--females <n>', 'Declared number of females', parseCount)
    .option('--metadata <json>', 'Free-form cohort metadata (JSON object)')
    .action(
      async (options: {
        name: string;
        uploadedBy: string;
        totalSampleSize?: number;
        males?: number;
        females?: number;
        metadata?: string;
      }) => {
        await runAction('cohort upsert', ({ config }) =>
          withServices(config, async ({ orchestrator }) => {
            const report = await upsertCohortCommand(orchestrator, options);
            print(report, `${report.created ? 'Created' : 'Updated'} cohort ${report.cohort.id}`);
            return EXIT_CODES.SUCCESS;
          })
        );
      }
    );

  cohort
    .command('list')
    .description('List cohorts with their file types')
    .option('--uploaded-by <user>', 'Only cohorts of this uploader')
    .action(async (options: { uploadedBy?: string }) => {
      await runAction('cohort list', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const entries = await listCohortsCommand(orchestrator, options.uploadedBy);
          print(
            entries,
            formatTable(
              entries.map((entry) => ({
                ...entry,
                validationStatus: entry.validationStatus ? 'yes' : 'no',
                fileTypes: entry.fileTypes.join(', '),
              })),
              [
                { key: 'id', header: 'Id' },
                { key: 'name', header: 'Name' },
                { key: 'uploadedBy', header: 'Uploaded by' },
                { key: 'validationStatus', header: 'Valid' },
                { key: 'fileTypes', header: 'Files' },
              ]
            )
          );
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  cohort
    .command('show <cohortId>')
    .description('Show a cohort and its files')
    .action(async (cohortId: string) => {
      await runAction('cohort show', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const { cohort: record, files } = await showCohortCommand(orchestrator, cohortId);
          const lines = [
            `${record.name} (${record.id}), uploaded by ${record.uploadedBy}`,
            `Validated: ${record.validationStatus ? 'yes' : 'no'}`,
            formatTable(
              files.map((file) => ({ id: file.id, fileType: file.fileType, fileName: file.fileName, fileSize: file.fileSize })),
              [
                { key: 'id', header: 'Id' },
                { key: 'fileType', header: 'Type' },
                { key: 'fileName', header: 'Name' },
                { key: 'fileSize', header: 'Bytes', align: 'right' },
              ]
            ),
          ];
          print({ cohort: record, files }, lines.join('\n'));
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  cohort
    .command('delete <cohortId>')
    .description('Delete a cohort with all of its files and stored objects')
    .action(async (cohortId: string) => {
      await runAction('cohort delete', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const report = await deleteCohortCommand(orchestrator, cohortId);
          print(report, `Deleted cohort ${report.cohortId} (${report.deletedFileIds.length} files)`);
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  cohort
    .command('upload <cohortId> <fileType> <file>')
    .description('Upload a *_male or *_female file to a cohort')
    .option('--mapping <json>', 'Column mapping as JSON (canonical role -> header)')
    .action(async (cohortId: string, fileType: string, file: string, options: { mapping?: string }) => {
      await runAction('cohort upload', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const report = await uploadFileCommand(orchestrator, { cohortId, fileType, file, ...options });
          const lines = [
            `Stored ${report.fileType} as ${report.fileId} (${report.filePath})`,
            ...(report.combinedFileId === null ? [] : [`Regenerated combined file ${report.combinedFileId}`]),
            ...(report.warning === null ? [] : [`Warning: ${report.warning}`]),
          ];
          print(report, lines.join('\n'));
          return report.warning === null ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
        })
      );
    });

  cohort
    .command('delete-file <fileId>')
    .description('Delete a file, its metadata and the stale combined file')
    .action(async (fileId: string) => {
      await runAction('cohort delete-file', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const report = await deleteFileCommand(orchestrator, fileId);
          print(report, `Deleted ${report.deletedFileIds.join(', ')}`);
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  cohort
    .command('download <fileId>')
    .description('Write the stored bytes of a file')
    .option('--out <file>', 'Write here instead of stdout')
    .action(async (fileId: string, options: { out?: string }) => {
      await runAction('cohort download', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const { body, ...report } = await downloadFileCommand(orchestrator, { fileId, ...options });
          if (report.output === null) {
            process.stdout.write(body);
          } else {
            print(report, `Wrote ${body.byteLength} bytes to ${report.output}`);
          }
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  program
    .command('validate-cohort <cohortId>')
    .description('Rebuild combined files and run cross-file consistency checks')
    .action(async (cohortId: string) => {
      await runAction('validate-cohort', ({ config }) =>
        withServices(config, async ({ orchestrator }) => {
          const outcome = await validateCohortCommand(orchestrator, cohortId);
          print(outcome, outcome.error === null ? `Cohort ${cohortId} is valid` : `Invalid: ${outcome.error}`);
          return exitCodeFor(outcome);
        })
      );
    });

  // ==========================================================================
  // Phenotype commands
  // ==========================================================================

  const phenotypes = program.command('phenotypes').description('Phenotype registry');

  phenotypes
    .command('seed [file]')
    .description('Insert or update phenotype definitions (default: bundled list)')
    .action(async (file: string | undefined) => {
      await runAction('phenotypes seed', ({ config }) =>
        withServices(config, async ({ repository }) => {
          const report = await seedPhenotypesCommand(repository, file);
          print(report, `Seeded ${report.count} phenotypes from ${report.file}`);
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  phenotypes
    .command('list')
    .description('List registered phenotype codes')
    .action(async () => {
      await runAction('phenotypes list', ({ config }) =>
        withServices(config, async ({ repository }) => {
          const rows = await listPhenotypesCommand(repository);
          print(
            rows,
            formatTable(rows.map((row) => ({ ...row })), [
              { key: 'phenotype_code', header: 'Code' },
              { key: 'description', header: 'Description' },
            ])
          );
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  phenotypes
    .command('add <code> [description]')
    .description('Register one phenotype code')
    .action(async (code: string, description: string | undefined) => {
      await runAction('phenotypes add', ({ config }) =>
        withServices(config, async ({ repository }) => {
          const row = await addPhenotypeCommand(repository, code, description);
          print(row, `Added phenotype ${row.phenotype_code}`);
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  phenotypes
    .command('delete <code>')
    .description('Remove one phenotype code')
    .action(async (code: string) => {
      await runAction('phenotypes delete', ({ config }) =>
        withServices(config, async ({ repository }) => {
          const report = await deletePhenotypeCommand(repository, code);
          print(report, `Deleted phenotype ${report.phenotypeCode}`);
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  phenotypes
    .command('totals')
    .description('Cases and controls per phenotype across every cohort')
    .action(async () => {
      await runAction('phenotypes totals', ({ config }) =>
        withServices(config, async ({ repository }) => {
          const totals = await phenotypeTotalsCommand(repository);
          print(
            totals,
            formatTable(totals.map((row) => ({ ...row })), [
              { key: 'phenotypeCode', header: 'Code' },
              { key: 'totalCases', header: 'Cases', align: 'right' },
              { key: 'totalControls', header: 'Controls', align: 'right' },
              { key: 'cohortCount', header: 'Cohorts', align: 'right' },
            ])
          );
          return EXIT_CODES.SUCCESS;
        })
      );
    });

  return program;
}

loadEnv();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(EXIT_CODES.ERRORS);
  });
