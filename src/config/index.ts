import { existsSync, readFileSync } from 'fs';
import { extname } from 'path';
import type { DateTime } from 'luxon';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_CHANNELS, DEFAULT_FILE_PREFIX } from '../constants/index.js';
import { ConfigError, errorMessage } from '../errors/index.js';
import type { ChannelMapping, DateRange, WetBulbMethod } from '../types/index.js';
import { parseDate } from '../utils/time.js';

export interface MergeConfig {
  inputDir: string;
  outputDir: string;
  range: DateRange;
  filePrefix: string;
  channels: ChannelMapping;
  wetBulbMethod: WetBulbMethod;
  plots: boolean;
}

// YYYYMMDD may arrive as a bare number from YAML/JSON
const dateField = z
  .union([z.string(), z.number().int()])
  .transform((value, ctx): DateTime => {
    const parsed = parseDate(String(value));
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid date format: ${value}. Use YYYYMMDD or YYYY-MM-DD`,
        fatal: true
      });
      return z.NEVER;
    }
    return parsed;
  });

const channelsSchema = z
  .object({
    black_globe: z.string().min(1).default(DEFAULT_CHANNELS.blackGlobe),
    air_temperature: z.string().min(1).default(DEFAULT_CHANNELS.airTemperature),
    relative_humidity: z.string().min(1).default(DEFAULT_CHANNELS.relativeHumidity),
    air_pressure: z.string().min(1).default(DEFAULT_CHANNELS.airPressure)
  })
  .default({});

export const configSchema = z
  .object({
    input_dir: z.string({ required_error: "Required field 'input_dir' missing from configuration" }).min(1),
    output_dir: z.string({ required_error: "Required field 'output_dir' missing from configuration" }).min(1),
    date_start: dateField,
    date_end: dateField,
    file_prefix: z.string().min(1).default(DEFAULT_FILE_PREFIX),
    channels: channelsSchema,
    wet_bulb_method: z.enum(['fixed-step', 'bisection']).default('fixed-step'),
    plots: z.boolean().default(true)
  })
  .refine(cfg => cfg.date_end.toMillis() >= cfg.date_start.toMillis(), {
    message: 'date_end must not be earlier than date_start',
    path: ['date_end']
  });

// Validate an already-read configuration object
export function parseConfig(raw: unknown, source = 'configuration'): MergeConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid configuration in ${source}`, issues);
  }

  const cfg = result.data;
  return {
    inputDir: cfg.input_dir,
    outputDir: cfg.output_dir,
    range: { start: cfg.date_start, end: cfg.date_end },
    filePrefix: cfg.file_prefix,
    channels: {
      blackGlobe: cfg.channels.black_globe,
      airTemperature: cfg.channels.air_temperature,
      relativeHumidity: cfg.channels.relative_humidity,
      airPressure: cfg.channels.air_pressure
    },
    wetBulbMethod: cfg.wet_bulb_method,
    plots: cfg.plots
  };
}

// Read a JSON or YAML configuration file
export function loadConfig(configPath: string): MergeConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf8');
  const ext = extname(configPath).toLowerCase();

  let raw: unknown;
  try {
    raw = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not read configuration ${configPath}: ${errorMessage(error)}`);
  }

  return parseConfig(raw, configPath);
}
