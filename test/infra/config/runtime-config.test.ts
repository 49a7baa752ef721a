import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_RUNTIME_CONFIG,
  applyEnvironmentOverrides,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  normalizeConfig,
  saveRuntimeConfig,
} from '../../../src/infra/config/runtime-config.js';

describe('runtime config', () => {
  let env: NodeJS.ProcessEnv;
  let logger: { warn: jest.Mock };

  beforeEach(() => {
    env = { TICKGRAPH_CONFIG_DIR: fs.mkdtempSync(path.join(os.tmpdir(), 'tickgraph-runtime-')) };
    logger = { warn: jest.fn() };
  });

  const writeConfig = (contents: string): void => {
    fs.writeFileSync(getRuntimeConfigPath(env), contents);
  };

  test('returns defaults without a config file', () => {
    expect(loadRuntimeConfig(env, logger)).toEqual(DEFAULT_RUNTIME_CONFIG);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('merges the file over the defaults', () => {
    writeConfig(JSON.stringify({ scheduler: { maxTimeSteps: 50 } }));

    expect(loadRuntimeConfig(env, logger)).toEqual({
      scheduler: { maxTimeSteps: 50, warnOnDefaultConditions: true },
      debug: { loggingEnabled: false },
    });
  });

  test('warns about an unreadable file and keeps the defaults', () => {
    writeConfig('{ not json');

    expect(loadRuntimeConfig(env, logger)).toEqual(DEFAULT_RUNTIME_CONFIG);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toBe(
      `[Config] Ignoring unreadable ${getRuntimeConfigPath(env)}:`
    );
  });

  test('applies environment overrides last', () => {
    writeConfig(JSON.stringify({ scheduler: { maxTimeSteps: 50 }, debug: { loggingEnabled: true } }));
    env.TICKGRAPH_MAX_TIME_STEPS = '7';
    env.TICKGRAPH_DEBUG = '0';

    const config = loadRuntimeConfig(env, logger);

    expect(config.scheduler.maxTimeSteps).toBe(7);
    expect(config.debug.loggingEnabled).toBe(false);
  });

  test('enables debug logging from DEBUG_MODE when TICKGRAPH_DEBUG is unset', () => {
    const config = applyEnvironmentOverrides(DEFAULT_RUNTIME_CONFIG, { DEBUG_MODE: 'yes' });

    expect(config.debug.loggingEnabled).toBe(true);
  });

  test('ignores a non-numeric step limit', () => {
    const config = applyEnvironmentOverrides(DEFAULT_RUNTIME_CONFIG, {
      TICKGRAPH_MAX_TIME_STEPS: 'lots',
    });

    expect(config.scheduler.maxTimeSteps).toBe(1000);
  });

  test('normalizes loose values field by field', () => {
    expect(
      normalizeConfig({
        scheduler: { maxTimeSteps: '12', warnOnDefaultConditions: 'off' },
        debug: { loggingEnabled: 'maybe' },
      })
    ).toEqual({
      scheduler: { maxTimeSteps: 12, warnOnDefaultConditions: false },
      debug: { loggingEnabled: false },
    });
    expect(normalizeConfig('garbage')).toEqual(DEFAULT_RUNTIME_CONFIG);
    expect(normalizeConfig({ scheduler: { maxTimeSteps: -3 } }).scheduler.maxTimeSteps).toBe(1000);
  });

  test('saves a config that loads back', () => {
    const config = {
      scheduler: { maxTimeSteps: 25, warnOnDefaultConditions: false },
      debug: { loggingEnabled: true },
    };

    saveRuntimeConfig(config, env);

    expect(loadRuntimeConfig(env, logger)).toEqual(config);
  });
});
