import { fileURLToPath } from 'url';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AggregationMethod } from '@tempscore/shared';
import { ConfigurationError } from './errors.js';

vi.mock('./ssm.js', () => ({
  getParameterValue: vi.fn(),
}));

// Import after mocks are set up
import { loadSettings, parseSettings } from './settings.js';
import { getParameterValue } from './ssm.js';

const fixturePath = fileURLToPath(new URL('./fixtures/settings.json', import.meta.url));

describe('parseSettings', () => {
  it('applies defaults to a minimal document', () => {
    const settings = parseSettings('{"dataProviders": []}', 'test');
    expect(settings.defaultScore).toBe(3.2);
    expect(settings.defaultAggregationMethod).toBe(AggregationMethod.WATS);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseSettings('{not json', 'settings.json')).toThrow(
      'Settings in settings.json are not valid JSON'
    );
  });

  it('rejects documents that fail the schema', () => {
    try {
      parseSettings('{"defaultScore": -1}', 'settings.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe('Invalid settings in settings.json');
        expect(error.details).toHaveProperty('issues');
      }
    }
  });
});

describe('loadSettings', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('reads the settings file when no parameter is named', async () => {
    const settings = await loadSettings({ paramName: '', path: fixturePath });

    expect(settings.defaultScore).toBe(3.1);
    expect(settings.defaultAggregationMethod).toBe(AggregationMethod.EQUAL);
    expect(settings.dataProviders).toEqual([
      {
        name: 'local',
        type: 'csv',
        parameters: { companiesPath: 'companies.csv', targetsPath: 'targets.csv' },
      },
    ]);
    expect(getParameterValue).not.toHaveBeenCalled();
  });

  it('fails with a ConfigurationError when the file is missing', async () => {
    await expect(
      loadSettings({ paramName: '', path: '/nonexistent/settings.json' })
    ).rejects.toThrow('Settings file not readable: /nonexistent/settings.json');
  });

  it('reads the SSM parameter when one is named', async () => {
    vi.mocked(getParameterValue).mockResolvedValue('{"defaultScore": 2.5}');

    const settings = await loadSettings({ paramName: '/tempscore/settings' });

    expect(getParameterValue).toHaveBeenCalledWith('/tempscore/settings');
    expect(settings.defaultScore).toBe(2.5);
    expect(settings.dataProviders).toEqual([]);
  });

  it('fails when the SSM parameter has no value', async () => {
    vi.mocked(getParameterValue).mockResolvedValue(null);

    await expect(loadSettings({ paramName: '/tempscore/settings' })).rejects.toThrow(
      'Settings parameter /tempscore/settings is empty'
    );
  });
});
