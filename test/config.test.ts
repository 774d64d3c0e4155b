import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, parseConfig } from '../src/config/index.js';
import { ConfigError } from '../src/errors/index.js';

const base = {
  input_dir: 'data/raw',
  output_dir: 'data/merged',
  date_start: '20240101',
  date_end: '2024-01-03'
};

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig(base);

    expect(config.inputDir).toBe('data/raw');
    expect(config.outputDir).toBe('data/merged');
    expect(config.range.start.toISODate()).toBe('2024-01-01');
    expect(config.range.end.toISODate()).toBe('2024-01-03');
    expect(config.filePrefix).toBe('MM1');
    expect(config.wetBulbMethod).toBe('fixed-step');
    expect(config.plots).toBe(true);
    expect(config.channels).toEqual({
      blackGlobe: 'BGTemp_C_Avg',
      airTemperature: 'AirTC_Avg',
      relativeHumidity: 'RH_Avg',
      airPressure: 'P_Air_Avg'
    });
  });

  it('accepts numeric dates and partial channel overrides', () => {
    const config = parseConfig({
      ...base,
      date_start: 20240105,
      date_end: 20240105,
      channels: { air_pressure: 'P_hPa' },
      wet_bulb_method: 'bisection'
    });

    expect(config.range.start.toISODate()).toBe('2024-01-05');
    expect(config.channels.airPressure).toBe('P_hPa');
    expect(config.channels.airTemperature).toBe('AirTC_Avg');
    expect(config.wetBulbMethod).toBe('bisection');
  });

  it('names the missing required field', () => {
    const rest = { output_dir: base.output_dir, date_start: base.date_start, date_end: base.date_end };
    expect(() => parseConfig(rest)).toThrow(ConfigError);
    expect(() => parseConfig(rest)).toThrow("input_dir: Required field 'input_dir' missing from configuration");
  });

  it('rejects malformed dates', () => {
    expect(() => parseConfig({ ...base, date_start: '01/01/2024' }))
      .toThrow('date_start: Invalid date format: 01/01/2024. Use YYYYMMDD or YYYY-MM-DD');
  });

  it('rejects an end date before the start date', () => {
    expect(() => parseConfig({ ...base, date_end: '20231231' }))
      .toThrow('date_end: date_end must not be earlier than date_start');
  });

  it('lists every issue on the error', () => {
    try {
      parseConfig({ date_start: 'x', date_end: '20240101' }, 'bad.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(3);
        expect(error.message.startsWith('Invalid configuration in bad.json\n  - ')).toBe(true);
      }
    }
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'metmerge-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports a missing file', () => {
    const path = join(dir, 'absent.json');
    expect(() => loadConfig(path)).toThrow(`Configuration file not found: ${path}`);
  });

  it('reads YAML', () => {
    const path = join(dir, 'merge.yaml');
    writeFileSync(path, [
      'input_dir: /data/in',
      'output_dir: /data/out',
      'date_start: 20240201',
      'date_end: 20240202',
      'file_prefix: MM2',
      'plots: false'
    ].join('\n'));

    const config = loadConfig(path);

    expect(config.filePrefix).toBe('MM2');
    expect(config.plots).toBe(false);
    expect(config.range.end.toISODate()).toBe('2024-02-02');
  });

  it('reads JSON', () => {
    const path = join(dir, 'merge.json');
    writeFileSync(path, JSON.stringify(base));

    expect(loadConfig(path).inputDir).toBe('data/raw');
  });

  it('wraps unparseable content in a ConfigError', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "input_dir": ');

    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow(`Could not read configuration ${path}`);
  });
});
