import {
  ConfigError,
  InternalError,
  iterateCandidates,
  loadConfigFile,
  loadWordList,
  normalizeBaseWords,
  parseWordsFlag,
  resolvePipelineInput,
  type MetricsSnapshot,
  type PassmithConfig,
  type PassmithError,
  type PipelineInput,
} from '@passmith/core';

import {
  resolveNumericFlags,
  resolveOutputFormat,
  resolveSeparatorMode,
  resolveWordSource,
  type CliOptions,
} from '../flags.js';
import { CandidateWriter, logLine, processIO, type CliIO } from '../output.js';

export interface GenerateReport {
  count: number;
  metrics: MetricsSnapshot;
  warnings: PassmithError[];
}

function resolveBaseWords(
  options: CliOptions,
  config: PassmithConfig
): string[] {
  const source = resolveWordSource(options);
  switch (source.kind) {
    case 'flag':
      return parseWordsFlag(source.value);
    case 'file': {
      const words = loadWordList(source.path);
      if (words.isErr()) throw words.error;
      return words.value;
    }
    case 'config':
      return normalizeBaseWords(config.base_words);
  }
}

function describeEffectiveInput(input: PipelineInput): string {
  return JSON.stringify(
    {
      baseWords: input.baseWords.length,
      templates: input.templatesByGroup,
      pools: input.pools,
      caseForms: input.caseForms,
      transformations: input.transformations,
      policy: input.policy,
      options: input.options,
    },
    null,
    2
  );
}

/**
 * `passmith generate`: load config and words, run the pipeline, write
 * candidates. Throws a PassmithError on any failure; the caller maps it to
 * an exit code.
 */
export function runGenerate(
  options: CliOptions,
  io: CliIO = processIO
): GenerateReport {
  if (!options.config) {
    throw new ConfigError({
      message: 'Missing --config <file>',
      context: { setting: '--config' },
    });
  }
  const outFormat = resolveOutputFormat(options.out);
  const separatorMode = resolveSeparatorMode(options.separatorMode);
  const numeric = resolveNumericFlags(options);

  const config = loadConfigFile(options.config);
  if (config.isErr()) throw config.error;

  const resolved = resolvePipelineInput(config.value, {
    baseWords: resolveBaseWords(options, config.value),
    years: numeric.years,
    now: io.now,
    pipeline: {
      applyLeet: options.leet === true,
      minLength: numeric.minLength,
      maxLength: numeric.maxLength,
      enforcePolicy: options.enforcePolicy === true,
      separatorMode,
      closureLimits: {
        maxRounds: numeric.maxLeetRounds,
        maxVariants: numeric.maxLeetVariants,
      },
      metricsEnabled: options.metrics !== false,
    },
  });
  if (resolved.isErr()) throw resolved.error;
  const { input, warnings } = resolved.value;

  for (const warning of warnings) {
    logLine(io, `warning ${warning.errorCode}: ${warning.message}`);
  }
  if (options.debugPasses) {
    logLine(io, `effective config: ${describeEffectiveInput(input)}`);
  }

  const stream = iterateCandidates(input);
  if (stream.isErr()) throw stream.error;

  const writer = new CandidateWriter(io, {
    format: outFormat,
    file: options.output,
    quiet: options.quiet === true,
  });

  let metrics: MetricsSnapshot | undefined;
  try {
    for (const event of stream.value) {
      if (event.kind === 'candidate') {
        writer.write(event.value);
      } else if (event.kind === 'error') {
        logLine(
          io,
          `stage ${event.stage} failed after ${writer.count} candidates`
        );
        throw event.error;
      } else {
        metrics = event.summary.metrics;
      }
    }
  } finally {
    writer.close();
  }

  if (!metrics) {
    throw new InternalError('Pipeline finished without a summary');
  }
  if (options.output) {
    logLine(io, `wrote ${writer.count} candidates to ${options.output}`);
  }
  if (options.printMetrics) {
    logLine(io, `metrics: ${JSON.stringify(metrics)}`);
  }

  return { count: writer.count, metrics, warnings };
}
