import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getConfigDir } from '../../../src/infra/config/config-paths.js';

function makeTempHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tickgraph-config-paths-'));
}

describe('getConfigDir', () => {
  test('respects and creates an explicit config dir override', () => {
    const overrideDir = path.join(makeTempHome(), 'custom-config');

    expect(getConfigDir({ TICKGRAPH_CONFIG_DIR: overrideDir })).toBe(overrideDir);
    expect(fs.existsSync(overrideDir)).toBe(true);
  });

  test('falls back to XDG_CONFIG_HOME', () => {
    const xdg = makeTempHome();

    expect(getConfigDir({ XDG_CONFIG_HOME: xdg })).toBe(path.join(xdg, 'tickgraph'));
  });

  test('falls back to ~/.config/tickgraph', () => {
    const home = makeTempHome();

    expect(getConfigDir({ HOME: home })).toBe(path.join(home, '.config', 'tickgraph'));
  });

  test('ignores blank overrides', () => {
    const home = makeTempHome();

    expect(getConfigDir({ HOME: home, TICKGRAPH_CONFIG_DIR: '  ' })).toBe(
      path.join(home, '.config', 'tickgraph')
    );
  });
});
