import { ZodError } from 'zod';
import { ProviderType, type DataProviderSummary } from '@tempscore/shared';
import { ConfigurationError } from '../errors.js';
import { logger as baseLogger, type Logger } from '../logger.js';
import type { ProviderConfig } from '../validation.js';
import { createCsvProvider } from './csv.js';
import { createInlineProvider } from './inline.js';
import { createS3CsvProvider } from './s3.js';
import type { DataProvider, ProviderFactory } from './types.js';

export const DATA_PROVIDER_FACTORIES: Readonly<Record<string, ProviderFactory>> = {
  [ProviderType.INLINE]: createInlineProvider,
  [ProviderType.CSV]: createCsvProvider,
  [ProviderType.S3]: createS3CsvProvider,
};

export interface ResolveOptions {
  // Fail instead of falling back when a requested provider is not configured
  strict?: boolean;
}

interface RegisteredProvider {
  name: string;
  type: string;
  provider: DataProvider;
}

/**
 * Holds the configured providers, built once at startup, and decides which of
 * them take part in a calculation.
 *
 * Selection policy: requested names are honoured in request order. When no
 * names are requested, or none of them match, every configured provider is
 * used in configuration order. The second case is logged; strict mode turns
 * any unmatched name into a ConfigurationError instead.
 */
export class ProviderRegistry {
  private readonly entries: RegisteredProvider[];

  constructor(
    configs: readonly ProviderConfig[],
    private readonly logger: Logger = baseLogger,
    factories: Readonly<Record<string, ProviderFactory>> = DATA_PROVIDER_FACTORIES
  ) {
    const names = new Set<string>();
    this.entries = configs.map((providerConfig) => {
      if (names.has(providerConfig.name)) {
        throw new ConfigurationError(`Duplicate data provider name: ${providerConfig.name}`);
      }
      names.add(providerConfig.name);

      const factory = Object.hasOwn(factories, providerConfig.type)
        ? factories[providerConfig.type]
        : undefined;
      if (!factory) {
        throw new ConfigurationError(
          `Unknown data provider type "${providerConfig.type}" for provider ${providerConfig.name}`,
          { allowed: Object.keys(factories) }
        );
      }

      return {
        name: providerConfig.name,
        type: providerConfig.type,
        provider: buildProvider(factory, providerConfig),
      };
    });
  }

  get size(): number {
    return this.entries.length;
  }

  describe(): DataProviderSummary[] {
    return this.entries.map(({ name, type }) => ({ name, type }));
  }

  resolve(requestedNames: readonly string[] = [], options: ResolveOptions = {}): DataProvider[] {
    if (this.entries.length === 0) {
      throw new ConfigurationError('No data providers are configured');
    }

    const all = this.entries.map((entry) => entry.provider);
    if (requestedNames.length === 0) {
      return all;
    }

    const selected: DataProvider[] = [];
    const unmatched: string[] = [];
    for (const name of new Set(requestedNames)) {
      const entry = this.entries.find((candidate) => candidate.name === name);
      if (entry) {
        selected.push(entry.provider);
      } else {
        unmatched.push(name);
      }
    }

    if (options.strict && unmatched.length > 0) {
      throw new ConfigurationError(`Unknown data provider(s): ${unmatched.join(', ')}`, {
        unmatched,
        available: this.entries.map((entry) => entry.name),
      });
    }

    if (selected.length === 0) {
      this.logger.warn(
        { requested: requestedNames },
        'No requested data provider is configured, falling back to all providers'
      );
      return all;
    }

    return selected;
  }
}

function buildProvider(factory: ProviderFactory, providerConfig: ProviderConfig): DataProvider {
  try {
    return factory(providerConfig.name, providerConfig.parameters);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        `Invalid parameters for data provider ${providerConfig.name}`,
        { issues: error.issues }
      );
    }
    throw error;
  }
}
