#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_RUNNER_CONFIG, DEFAULT_STEP_SIZE } from './config/defaults';
import { loadConfigFiles, loadRunnerFile } from './config/loader';
import { ConfigCatalog, RunnerCatalog } from './config/schema';
import { MatrixEntry } from './matrix/entry';
import { evalEntriesOnly, markEvalEntries } from './matrix/evals';
import { generateFullSweep } from './matrix/full-sweep';
import { generateRunnerModelSweep } from './matrix/runner-model-sweep';
import { SEQ_LEN_NAMES, SeqLenName } from './matrix/seq-len';
import { generateTestConfigSweep } from './matrix/test-config';
import { NodeMode } from './matrix/types';
import { resolveLogLevel } from './utils/env';
import { LOG_LEVELS, Logger, LogSink } from './utils/logger';

export interface CliIo {
  stdout: LogSink;
  logger: Logger;
}

type CommonCliOptions = {
  configFiles: string[];
  runnerConfig: string;
  runEvals?: boolean;
  evalsOnly?: boolean;
  runnerNodeFilter?: string;
  logLevel?: string;
};

type NodeModeCliOptions = {
  singleNode?: boolean;
  multiNode?: boolean;
};

type FullSweepCliOptions = CommonCliOptions & NodeModeCliOptions & {
  modelPrefix?: string[];
  precision?: string[];
  framework?: string[];
  runnerType?: string[];
  seqLens?: SeqLenName[];
  stepSize: number;
  maxTp?: number;
  maxEp?: number;
  minConc?: number;
  maxConc?: number;
};

type RunnerModelSweepCliOptions = CommonCliOptions & NodeModeCliOptions & {
  runnerType: string;
  modelPrefix?: string[];
  precision?: string[];
  framework?: string[];
  conc?: number;
};

type TestConfigCliOptions = CommonCliOptions & {
  configKeys: string[];
  conc?: number[];
};

function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Integer out of range.');
  }
  return parsed;
}

function parseStepSize(value: string): number {
  const step = parseInteger(value);
  if (step <= 1) {
    throw new InvalidArgumentError('Must be greater than 1.');
  }
  return step;
}

function collectIntegers(value: string, previous: number[] | undefined): number[] {
  return [...(previous ?? []), parseInteger(value)];
}

function addCommonOptions(command: Command): Command {
  return command
    .requiredOption('--config-files <paths...>', 'one or more master config files (YAML)')
    .option('--runner-config <path>', 'runner inventory file (YAML)', DEFAULT_RUNNER_CONFIG)
    .addOption(
      new Option('--run-evals', 'mark the entries selected for accuracy evals').conflicts(
        'evalsOnly',
      ),
    )
    .addOption(
      new Option('--evals-only', 'emit only the entries selected for accuracy evals').conflicts(
        'runEvals',
      ),
    )
    .option('--runner-node-filter <substring>', 'keep only runner nodes containing this substring')
    .addOption(new Option('--log-level <level>', 'diagnostic verbosity on stderr').choices(LOG_LEVELS));
}

function addNodeModeOptions(command: Command): Command {
  return command
    .addOption(new Option('--single-node', 'expand single-node configs').conflicts('multiNode'))
    .addOption(new Option('--multi-node', 'expand multinode configs').conflicts('singleNode'));
}

function addCatalogFilterOptions(command: Command): Command {
  return command
    .option('--model-prefix <prefixes...>', 'keep config keys starting with any of these')
    .option('--precision <values...>', 'keep configs with any of these precisions')
    .option('--framework <values...>', 'keep configs with any of these frameworks');
}

function nodeModeOf(options: NodeModeCliOptions, command: Command): NodeMode {
  if (options.singleNode) return 'single-node';
  if (options.multiNode) return 'multi-node';
  return command.error(
    "error: one of the options '--single-node' or '--multi-node' is required",
  );
}

type MatrixBuilder = (catalog: ConfigCatalog, runners: RunnerCatalog) => MatrixEntry[];

function emitMatrix(io: CliIo, options: CommonCliOptions, build: MatrixBuilder): void {
  const { logger } = io;
  logger.setLevel(resolveLogLevel(options.logLevel));

  const catalog = loadConfigFiles(options.configFiles);
  const runners = loadRunnerFile(options.runnerConfig);
  logger.debug(
    `loaded ${catalog.size} configs from ${options.configFiles.join(', ')}; ` +
      `${runners.size} runner types from ${options.runnerConfig}`,
  );

  let matrix = build(catalog, runners);
  if (options.runEvals || options.evalsOnly) {
    matrix = markEvalEntries(matrix);
    if (options.evalsOnly) matrix = evalEntriesOnly(matrix);
  }

  logger.debug(`generated ${matrix.length} matrix entries`);
  logger.traceBlock('matrix', JSON.stringify(matrix, null, 2));
  io.stdout.write(`${JSON.stringify(matrix)}\n`);
}

export function createProgram(io: CliIo): Command {
  const program = new Command()
    .name('sweep-matrix')
    .description('Generate benchmark sweep matrices from master config files')
    .showHelpAfterError();

  const fullSweep = program
    .command('full-sweep')
    .description('expand every config that passes the filters');
  addCommonOptions(fullSweep);
  addNodeModeOptions(fullSweep);
  addCatalogFilterOptions(fullSweep);
  fullSweep
    .option('--runner-type <types...>', 'keep configs declared for any of these runner types')
    .addOption(
      new Option('--seq-lens <names...>', 'keep only these sequence-length profiles').choices(
        SEQ_LEN_NAMES,
      ),
    )
    .option('--step-size <n>', 'concurrency multiplier for ranges', parseStepSize, DEFAULT_STEP_SIZE)
    .option('--max-tp <n>', 'clamp TP to at most this value', parseInteger)
    .option('--max-ep <n>', 'clamp EP to at most this value', parseInteger)
    .option('--min-conc <n>', 'drop or narrow concurrency below this value', parseInteger)
    .option('--max-conc <n>', 'drop or narrow concurrency above this value', parseInteger)
    .action((_options: unknown, command: Command) => {
      const options = command.opts<FullSweepCliOptions>();
      const nodeMode = nodeModeOf(options, command);
      emitMatrix(io, options, (catalog, runners) =>
        generateFullSweep(
          catalog,
          runners,
          {
            nodeMode,
            modelPrefix: options.modelPrefix,
            precision: options.precision,
            framework: options.framework,
            runnerType: options.runnerType,
            seqLens: options.seqLens,
            stepSize: options.stepSize,
            maxTp: options.maxTp,
            maxEp: options.maxEp,
            minConc: options.minConc,
            maxConc: options.maxConc,
            runnerNodeFilter: options.runnerNodeFilter,
          },
          io.logger,
        ),
      );
    });

  const runnerModelSweep = program
    .command('runner-model-sweep')
    .description('one representative entry per config on every node of a runner type');
  addCommonOptions(runnerModelSweep);
  addNodeModeOptions(runnerModelSweep);
  addCatalogFilterOptions(runnerModelSweep);
  runnerModelSweep
    .requiredOption('--runner-type <type>', 'runner type whose nodes are exercised')
    .option('--conc <n>', 'concurrency used for every entry', parseInteger)
    .action((_options: unknown, command: Command) => {
      const options = command.opts<RunnerModelSweepCliOptions>();
      const nodeMode = nodeModeOf(options, command);
      emitMatrix(io, options, (catalog, runners) =>
        generateRunnerModelSweep(
          catalog,
          runners,
          {
            nodeMode,
            runnerType: options.runnerType,
            modelPrefix: options.modelPrefix,
            precision: options.precision,
            framework: options.framework,
            conc: options.conc,
            runnerNodeFilter: options.runnerNodeFilter,
          },
          io.logger,
        ),
      );
    });

  const testConfig = program
    .command('test-config')
    .description('expand the named configs in full, ignoring sweep filters');
  addCommonOptions(testConfig);
  testConfig
    .requiredOption('--config-keys <keys...>', 'config keys to expand')
    .option('--conc <values...>', 'keep only these concurrency values', collectIntegers)
    .action((_options: unknown, command: Command) => {
      const options = command.opts<TestConfigCliOptions>();
      emitMatrix(io, options, (catalog) =>
        generateTestConfigSweep(
          catalog,
          { configKeys: options.configKeys, conc: options.conc },
          io.logger,
        ),
      );
    });

  return program;
}

export function main(argv: string[] = process.argv): void {
  const logger = new Logger();
  const program = createProgram({ stdout: process.stdout, logger });
  try {
    program.parse(argv);
  } catch (err: unknown) {
    logger.error('Matrix generation failed', err);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
