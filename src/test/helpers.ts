import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigCatalog,
  ConfigEntry,
  MultinodeConfigEntry,
  RunnerCatalog,
  SingleNodeConfigEntry,
  WorkerConfig,
} from '../config/schema';
import { Field } from '../matrix/fields';
import { Logger, LogLevel } from '../utils/logger';

export function makeWorker(
  numWorker: number,
  tp: number,
  ep: number,
  dpAttn: boolean,
): WorkerConfig {
  return {
    [Field.NumWorker]: numWorker,
    [Field.Tp]: tp,
    [Field.Ep]: ep,
    [Field.DpAttn]: dpAttn,
  };
}

/** 1k1k, one TP 8 point sweeping concurrency 4..16 on `h100`. */
export function makeSingleNodeConfig(
  overrides: Partial<SingleNodeConfigEntry> = {},
): SingleNodeConfigEntry {
  return {
    [Field.Image]: 'registry.test/serve:1.0',
    [Field.Model]: 'org/model-a',
    [Field.ModelPrefix]: 'modela',
    [Field.Precision]: 'fp8',
    [Field.Framework]: 'vllm',
    [Field.Runner]: 'h100',
    [Field.Disagg]: false,
    [Field.Multinode]: false,
    [Field.SeqLenConfigs]: [
      {
        [Field.Isl]: 1024,
        [Field.Osl]: 1024,
        [Field.SearchSpace]: [{ [Field.Tp]: 8, [Field.ConcStart]: 4, [Field.ConcEnd]: 16 }],
      },
    ],
    ...overrides,
  };
}

/** 1k1k, one disaggregated point with concurrency list [16, 64] on `gb200`. */
export function makeMultinodeConfig(
  overrides: Partial<MultinodeConfigEntry> = {},
): MultinodeConfigEntry {
  return {
    [Field.Image]: 'registry.test/serve:1.0',
    [Field.Model]: 'org/model-b',
    [Field.ModelPrefix]: 'modelb',
    [Field.Precision]: 'fp4',
    [Field.Framework]: 'dynamo-trt',
    [Field.Runner]: 'gb200',
    [Field.Disagg]: true,
    [Field.Multinode]: true,
    [Field.SeqLenConfigs]: [
      {
        [Field.Isl]: 1024,
        [Field.Osl]: 1024,
        [Field.SearchSpace]: [
          {
            [Field.Prefill]: makeWorker(1, 4, 4, false),
            [Field.Decode]: makeWorker(2, 8, 8, true),
            [Field.ConcList]: [16, 64],
          },
        ],
      },
    ],
    ...overrides,
  };
}

export function makeCatalog(entries: Record<string, ConfigEntry>): ConfigCatalog {
  return new Map(Object.entries(entries));
}

const DEFAULT_RUNNERS: Record<string, string[]> = {
  h100: ['h100-node-01', 'h100-node-02'],
  gb200: ['gb200-rack-a', 'gb200-rack-b'],
  mi300x: ['mi300x-01'],
};

export function makeRunners(runners: Record<string, string[]> = DEFAULT_RUNNERS): RunnerCatalog {
  return new Map(Object.entries(runners));
}

/** Logger writing into an array, one element per line written. */
export function makeCapturingLogger(level: LogLevel = 'info'): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = new Logger({ write: (chunk: string) => lines.push(chunk) });
  logger.setLevel(level);
  return { logger, lines };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'sweep-matrix-test-'));
}

/** Write `content` to `dir/name` and return the full path. */
export function writeFixture(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
