import type {
  CompanyRecord,
  FieldValue,
  PortfolioCompany,
  TargetRecord,
  WorkingCompany,
} from '@tempscore/shared';
import { config } from '../config.js';
import { EmptyResultError, ProviderFailure } from '../errors.js';
import { logger as baseLogger, type Logger } from '../logger.js';
import type { DataProvider } from '../providers/types.js';

export interface AssembleOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export interface AssembledPortfolio {
  companies: WorkingCompany[];
  // Portfolio companies no provider knows about, in portfolio order
  unmatchedCompanyIds: string[];
}

interface ProviderResponse {
  companies: CompanyRecord[];
  targets: TargetRecord[];
}

const EMPTY_RESPONSE: ProviderResponse = { companies: [], targets: [] };

// ============================================================
// Provider queries
// ============================================================

/**
 * Run a provider query against a timer. On timeout the query's signal is
 * aborted and the call fails with a ProviderFailure.
 */
export async function withTimeout<T>(
  providerName: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderFailure(providerName, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Query one provider for companies and targets. A provider that fails either
 * query contributes nothing; the failure is logged, not raised.
 */
async function queryProvider(
  provider: DataProvider,
  companyIds: readonly string[],
  timeoutMs: number,
  log: Logger
): Promise<ProviderResponse> {
  const [companies, targets] = await Promise.allSettled([
    withTimeout(provider.name, timeoutMs, (signal) => provider.getCompanyData(companyIds, { signal })),
    withTimeout(provider.name, timeoutMs, (signal) => provider.getTargetData(companyIds, { signal })),
  ]);

  if (companies.status === 'fulfilled' && targets.status === 'fulfilled') {
    log.debug(
      { provider: provider.name, companies: companies.value.length, targets: targets.value.length },
      'Data provider responded'
    );
    return { companies: companies.value, targets: targets.value };
  }

  const reason: unknown =
    companies.status === 'rejected'
      ? companies.reason
      : targets.status === 'rejected'
        ? targets.reason
        : undefined;
  const failure =
    reason instanceof ProviderFailure
      ? reason
      : new ProviderFailure(provider.name, reason instanceof Error ? reason.message : String(reason));
  log.warn({ provider: provider.name, error: failure.message }, 'Data provider failed, treating as empty');
  return EMPTY_RESPONSE;
}

// ============================================================
// Merge
// ============================================================

function providerFields(record: CompanyRecord): Record<string, FieldValue> {
  const known: Record<string, FieldValue | undefined> = {
    companyId: record.companyId,
    companyName: record.companyName,
    sector: record.sector,
    region: record.region,
    benchmark: record.benchmark,
    ghgS1S2: record.ghgS1S2,
    ghgS3: record.ghgS3,
    marketCap: record.marketCap,
    enterpriseValue: record.enterpriseValue,
    evPlusCash: record.evPlusCash,
    totalAssets: record.totalAssets,
    revenue: record.revenue,
  };

  // Named provider columns win over the provider's free-form attributes
  const fields: Record<string, FieldValue> = { ...record.attributes };
  for (const [key, value] of Object.entries(known)) {
    if (value !== undefined) fields[key] = value;
  }
  return fields;
}

function callerFields(entry: PortfolioCompany): Record<string, FieldValue> {
  return {
    ...entry.fields,
    ...(entry.companyName === undefined ? {} : { companyName: entry.companyName }),
    ...(entry.investmentValue === undefined ? {} : { investmentValue: entry.investmentValue }),
  };
}

/**
 * Merge a portfolio entry with its provider record. Caller columns override
 * provider columns of the same name; the identifier is always the caller's.
 */
export function mergeCompany(
  entry: PortfolioCompany,
  record: CompanyRecord,
  targets: readonly TargetRecord[]
): WorkingCompany {
  const fields: Record<string, FieldValue> = {
    ...providerFields(record),
    ...callerFields(entry),
    companyId: entry.companyId,
  };

  // A blank caller name keeps the provider's
  const name = fields.companyName;
  const companyName = typeof name === 'string' && name.trim() !== '' ? name : record.companyName;
  return {
    companyId: entry.companyId,
    companyName,
    fields: { ...fields, companyName },
    targets,
  };
}

// ============================================================
// Assembly
// ============================================================

/**
 * Query every provider concurrently and merge the portfolio with what they
 * return. Provider order is priority order: the first provider with a company
 * record (or with targets) for an identifier wins for that identifier.
 *
 * Companies without a company record are dropped and reported as unmatched.
 * When nothing matches at all the request fails with EmptyResultError.
 */
export async function assemblePortfolio(
  providers: readonly DataProvider[],
  portfolio: readonly PortfolioCompany[],
  options: AssembleOptions = {}
): Promise<AssembledPortfolio> {
  const log = options.logger ?? baseLogger;
  const timeoutMs = options.timeoutMs ?? config.providers.timeoutMs;
  const companyIds = portfolio.map((entry) => entry.companyId);

  const responses = await Promise.all(
    providers.map((provider) => queryProvider(provider, companyIds, timeoutMs, log))
  );

  const companyRecords = new Map<string, CompanyRecord>();
  const targetsByCompany = new Map<string, TargetRecord[]>();
  for (const response of responses) {
    for (const record of response.companies) {
      if (!companyRecords.has(record.companyId)) {
        companyRecords.set(record.companyId, record);
      }
    }

    const providerTargets = new Map<string, TargetRecord[]>();
    for (const target of response.targets) {
      const list = providerTargets.get(target.companyId) ?? [];
      list.push(target);
      providerTargets.set(target.companyId, list);
    }
    for (const [companyId, targets] of providerTargets) {
      if (!targetsByCompany.has(companyId)) {
        targetsByCompany.set(companyId, targets);
      }
    }
  }

  const companies: WorkingCompany[] = [];
  const unmatchedCompanyIds: string[] = [];
  for (const entry of portfolio) {
    const record = companyRecords.get(entry.companyId);
    if (!record) {
      unmatchedCompanyIds.push(entry.companyId);
      continue;
    }
    companies.push(mergeCompany(entry, record, targetsByCompany.get(entry.companyId) ?? []));
  }

  if (companies.length === 0) {
    throw new EmptyResultError();
  }

  log.debug(
    { matched: companies.length, unmatched: unmatchedCompanyIds.length, providers: providers.length },
    'Portfolio assembled'
  );
  return { companies, unmatchedCompanyIds };
}
