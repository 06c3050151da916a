import * as path from 'path';
import { loadConfig } from '../index';

describe('Config', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      dataDir: path.resolve('data'),
      loadTimeoutMs: 5000,
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ PORT: '8080', DATA_DIR: '/srv/realty', LOAD_TIMEOUT_MS: '250' });

    expect(config).toEqual({ port: 8080, dataDir: '/srv/realty', loadTimeoutMs: 250 });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ LOAD_TIMEOUT_MS: 'soon' })).toThrow(/^Invalid environment variables: /);
  });
});
