// MorphoApiService: paginated, rate-limited access to the Morpho Blue GraphQL API
import { ClientError, GraphQLClient, gql } from 'graphql-request';
import { z, ZodError } from 'zod';

import { DEFAULT_API_URL } from '../config/envSchema.js';
import { createScopedLogger, errorMessage, type Logger } from '../logging/logger.js';
import {
  apiRequestDuration,
  apiRequestsTotal,
  apiRetriesTotal,
  itemsSkippedTotal
} from '../metrics/index.js';
import {
  AdminEventSchema,
  AllocationHistorySchema,
  MarketHistorySchema,
  MarketSchema,
  VaultShareHistorySchema,
  PageSchema,
  ReallocationSchema,
  VaultSchema,
  type RawAdminEvent,
  type RawAllocationHistory,
  type RawMarket,
  type RawMarketHistory,
  type RawReallocation,
  type RawVault,
  type RawVaultShareHistory
} from './apiSchemas.js';
import { RequestBudget, getGlobalRequestBudget } from './RequestBudget.js';

const ASSET_FIELDS = 'address symbol decimals priceUsd';

const MARKET_FIELDS = `
  uniqueKey
  listed
  lltv
  loanAsset { ${ASSET_FIELDS} }
  collateralAsset { ${ASSET_FIELDS} }
  morphoBlue { chain { id network } }
  state {
    timestamp
    supplyAssets
    borrowAssets
    collateralAssets
    liquidityAssets
    supplyAssetsUsd
    borrowAssetsUsd
    collateralAssetsUsd
    liquidityAssetsUsd
    utilization
    price
  }
  warnings {
    type
    level
    metadata {
      ... on BadDebtUnrealizedMarketWarningMetadata { badDebtUsd badDebtShare }
    }
  }
  badDebt { underlying usd }
  realizedBadDebt { underlying usd }
  supplyingVaults { address }
`;

const ORACLE_DATA_FIELDS = `
  data {
    ... on MorphoChainlinkOracleData {
      baseFeedOne { address }
      baseFeedTwo { address }
      baseOracleVault { address }
      quoteFeedOne { address }
      quoteFeedTwo { address }
      scaleFactor
    }
    ... on MorphoChainlinkOracleV2Data {
      baseFeedOne { address }
      baseFeedTwo { address }
      baseOracleVault { address }
      quoteFeedOne { address }
      quoteFeedTwo { address }
      quoteOracleVault { address }
      scaleFactor
    }
  }
`;

const VAULT_FIELDS = `
  address
  name
  symbol
  listed
  chain { id network }
  publicAllocatorConfig { fee }
  state {
    totalAssetsUsd
    sharePrice
    sharePriceUsd
    timelock
    curator
    owner
    guardian
    curators { name }
    allocation {
      market {
        uniqueKey
        collateralAsset { symbol }
        loanAsset { symbol }
      }
      supplyAssets
      supplyAssetsUsd
      supplyCap
      supplyCapUsd
      enabled
      removableAt
      pendingSupplyCap
      pendingSupplyCapValidAt
    }
  }
`;

const REALLOCATION_FIELDS = `
  hash
  timestamp
  type
  assets
  vault { address }
  market { uniqueKey }
`;

const MARKETS_QUERY = gql`
  query Markets($first: Int!, $skip: Int!, $chainIds: [Int!]) {
    markets(first: $first, skip: $skip, where: { chainId_in: $chainIds }) {
      items { ${MARKET_FIELDS} oracle { address type } }
      pageInfo { count countTotal }
    }
  }
`;

const MARKET_WITH_ORACLE_QUERY = gql`
  query MarketWithOracle($uniqueKey: String!, $chainId: Int!) {
    marketByUniqueKey(uniqueKey: $uniqueKey, chainId: $chainId) {
      ${MARKET_FIELDS}
      oracle { address type ${ORACLE_DATA_FIELDS} }
    }
  }
`;

const MARKET_QUERY = gql`
  query Market($uniqueKey: String!, $chainId: Int!) {
    marketByUniqueKey(uniqueKey: $uniqueKey, chainId: $chainId) {
      ${MARKET_FIELDS}
      oracle { address type }
    }
  }
`;

const VAULTS_BY_MARKETS_QUERY = gql`
  query VaultsByMarkets($first: Int!, $skip: Int!, $chainIds: [Int!], $keys: [String!]) {
    vaults(first: $first, skip: $skip, where: { chainId_in: $chainIds, marketUniqueKey_in: $keys }) {
      items { ${VAULT_FIELDS} }
      pageInfo { count countTotal }
    }
  }
`;

const VAULT_QUERY = gql`
  query Vault($address: String!, $chainId: Int!) {
    vaultByAddress(address: $address, chainId: $chainId) { ${VAULT_FIELDS} }
  }
`;

const REALLOCATIONS_BY_MARKETS_QUERY = gql`
  query ReallocationsByMarkets($first: Int!, $skip: Int!, $chainIds: [Int!], $keys: [String!]) {
    vaultReallocates(
      first: $first
      skip: $skip
      where: { chainId_in: $chainIds, marketUniqueKey_in: $keys }
      orderBy: Timestamp
      orderDirection: Asc
    ) {
      items { ${REALLOCATION_FIELDS} }
      pageInfo { count countTotal }
    }
  }
`;

const REALLOCATIONS_BY_VAULTS_QUERY = gql`
  query ReallocationsByVaults(
    $first: Int!
    $skip: Int!
    $chainIds: [Int!]
    $vaults: [String!]
    $start: Int
    $end: Int
  ) {
    vaultReallocates(
      first: $first
      skip: $skip
      where: { chainId_in: $chainIds, vaultAddress_in: $vaults, timestamp_gte: $start, timestamp_lte: $end }
      orderBy: Timestamp
      orderDirection: Asc
    ) {
      items { ${REALLOCATION_FIELDS} }
      pageInfo { count countTotal }
    }
  }
`;

const VAULT_ALLOCATION_HISTORY_QUERY = gql`
  query VaultAllocationHistory($address: String!, $chainId: Int!, $start: Int!, $end: Int!) {
    vaultByAddress(address: $address, chainId: $chainId) {
      historicalState {
        allocation {
          market { uniqueKey }
          supplyAssetsUsd(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
          supplyCap(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
        }
      }
    }
  }
`;

const ADMIN_EVENTS_ENRICHED_QUERY = gql`
  query VaultAdminEvents($address: String!, $chainId: Int!, $first: Int!, $skip: Int!) {
    vaultByAddress(address: $address, chainId: $chainId) {
      adminEvents(first: $first, skip: $skip) {
        items {
          hash
          timestamp
          type
          data {
            ... on CapEventData { cap market { uniqueKey } }
          }
        }
        pageInfo { count countTotal }
      }
    }
  }
`;

const ADMIN_EVENTS_BASIC_QUERY = gql`
  query VaultAdminEventsBasic($address: String!, $chainId: Int!, $first: Int!, $skip: Int!) {
    vaultByAddress(address: $address, chainId: $chainId) {
      adminEvents(first: $first, skip: $skip) {
        items { hash timestamp type }
        pageInfo { count countTotal }
      }
    }
  }
`;

const ADMIN_QUEUE_EVENTS_QUERY = gql`
  query VaultQueueEvents($address: String!, $chainId: Int!, $first: Int!, $skip: Int!) {
    vaultByAddress(address: $address, chainId: $chainId) {
      adminEvents(first: $first, skip: $skip) {
        items {
          hash
          timestamp
          type
          data {
            ... on SetWithdrawQueueEventData { withdrawQueue { uniqueKey } }
          }
        }
        pageInfo { count countTotal }
      }
    }
  }
`;

const MARKET_HISTORY_QUERY = gql`
  query MarketHistory($uniqueKey: String!, $chainId: Int!, $start: Int!, $end: Int!) {
    marketByUniqueKey(uniqueKey: $uniqueKey, chainId: $chainId) {
      historicalState {
        utilization(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
        supplyAssetsUsd(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
        borrowAssetsUsd(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
        liquidityAssetsUsd(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
      }
    }
  }
`;

const VAULT_SHARE_HISTORY_QUERY = gql`
  query VaultShareHistory($address: String!, $chainId: Int!, $start: Int!, $end: Int!) {
    vaultByAddress(address: $address, chainId: $chainId) {
      historicalState {
        sharePriceNumber(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
        totalAssetsUsd(options: { startTimestamp: $start, endTimestamp: $end, interval: DAY }) { x y }
      }
    }
  }
`;

const MarketsEnvelope = z.object({ markets: PageSchema });
const VaultsEnvelope = z.object({ vaults: PageSchema });
const ReallocatesEnvelope = z.object({ vaultReallocates: PageSchema });
const MarketEnvelope = z.object({ marketByUniqueKey: z.unknown() });
const VaultEnvelope = z.object({ vaultByAddress: z.unknown() });
const AllocationHistoryEnvelope = z.object({
  vaultByAddress: z
    .object({
      historicalState: z
        .object({ allocation: z.array(z.unknown()).nullish() })
        .nullish()
    })
    .nullish()
});
const AdminEventsEnvelope = z.object({
  vaultByAddress: z.object({ adminEvents: PageSchema }).nullish()
});
const MarketHistoryEnvelope = z.object({
  marketByUniqueKey: z.object({ historicalState: MarketHistorySchema.nullish() }).nullish()
});

const VaultShareHistoryEnvelope = z.object({
  vaultByAddress: z.object({ historicalState: VaultShareHistorySchema.nullish() }).nullish()
});

type Page = z.infer<typeof PageSchema>;

export interface PageResult<T> {
  items: T[];
  /** False when a page failed after retries and the listing stopped early. */
  complete: boolean;
  countTotal: number;
}

export interface TimeWindow {
  start: number;
  end: number;
}

export interface PageSizes {
  markets: number;
  vaults: number;
  reallocations: number;
  adminEvents: number;
}

export interface AdminEventsResult {
  events: RawAdminEvent[];
  /** False when cap/market enrichment failed and only types and timestamps are known. */
  enriched: boolean;
}

export interface MorphoApiServiceOptions {
  client?: Pick<GraphQLClient, 'request'>;
  endpoint?: string;
  budget?: RequestBudget;
  retryAttempts?: number;
  retryBaseMs?: number;
  pageSizes?: Partial<PageSizes>;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Raised once an operation has exhausted its retries.
 */
export class ApiRequestError extends Error {
  readonly operation: string;
  readonly original: unknown;

  constructor(operation: string, original: unknown) {
    super(`${operation} failed: ${errorMessage(original)}`);
    this.name = 'ApiRequestError';
    this.operation = operation;
    this.original = original;
  }
}

/**
 * Network failures, throttling and server errors are worth another attempt;
 * schema errors and GraphQL validation errors are not.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof ZodError) return false;
  if (err instanceof ClientError) {
    const status = err.response.status;
    if (status === 429 || status >= 500) return true;
    return /timeout|timed out|rate limit|too many requests/i.test(err.message);
  }
  return true;
}

export function isNotFoundError(err: unknown): boolean {
  const original = err instanceof ApiRequestError ? err.original : err;
  if (!(original instanceof ClientError)) return false;
  const errors = original.response.errors ?? [];
  return errors.some(
    (e) => e.extensions?.code === 'NOT_FOUND' || /no results matching/i.test(e.message)
  );
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class MorphoApiService {
  private client: Pick<GraphQLClient, 'request'>;
  private readonly budget: RequestBudget;
  private readonly retryAttempts: number;
  private readonly retryBaseMs: number;
  private readonly pageSizes: PageSizes;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(opts: MorphoApiServiceOptions = {}) {
    this.client = opts.client ?? new GraphQLClient(opts.endpoint ?? DEFAULT_API_URL);
    this.budget = opts.budget ?? getGlobalRequestBudget();
    this.retryAttempts = Math.max(1, opts.retryAttempts ?? 3);
    this.retryBaseMs = Math.max(0, opts.retryBaseMs ?? 1000);
    this.pageSizes = {
      markets: 100,
      vaults: 100,
      reallocations: 500,
      adminEvents: 100,
      ...opts.pageSizes
    };
    this.sleep = opts.sleep ?? defaultSleep;
    this.logger = opts.logger ?? createScopedLogger('morpho-api');
  }

  /** All markets on a chain. */
  async listMarkets(chainId: number): Promise<PageResult<RawMarket>> {
    return this.paginate('listMarkets', this.pageSizes.markets, MarketSchema, async (first, skip) => {
      const data = await this.request('listMarkets', MARKETS_QUERY, { first, skip, chainIds: [chainId] });
      return MarketsEnvelope.parse(data).markets;
    });
  }

  /**
   * One market with its oracle feed configuration. Oracle feed data fails to
   * resolve for some oracle types, so on error the query is repeated without it.
   */
  async getMarket(uniqueKey: string, chainId: number): Promise<RawMarket | null> {
    const variables = { uniqueKey, chainId };
    let data: unknown;
    try {
      data = await this.perform('getMarket', () => this.request('getMarket', MARKET_WITH_ORACLE_QUERY, variables));
    } catch (err) {
      if (isNotFoundError(err)) return null;
      this.logger.warn('Market oracle data unavailable, retrying without it', {
        uniqueKey,
        chainId,
        error: errorMessage(err)
      });
      try {
        data = await this.perform('getMarketBasic', () => this.request('getMarketBasic', MARKET_QUERY, variables));
      } catch (fallbackErr) {
        if (isNotFoundError(fallbackErr)) return null;
        throw fallbackErr;
      }
    }
    const market = MarketEnvelope.parse(data).marketByUniqueKey;
    if (market === null || market === undefined) return null;
    return MarketSchema.parse(market);
  }

  /** Vaults currently allocating to any of the given markets. */
  async listVaultsByMarkets(chainId: number, uniqueKeys: string[]): Promise<PageResult<RawVault>> {
    if (uniqueKeys.length === 0) return { items: [], complete: true, countTotal: 0 };
    return this.paginate('listVaultsByMarkets', this.pageSizes.vaults, VaultSchema, async (first, skip) => {
      const data = await this.request('listVaultsByMarkets', VAULTS_BY_MARKETS_QUERY, {
        first,
        skip,
        chainIds: [chainId],
        keys: uniqueKeys
      });
      return VaultsEnvelope.parse(data).vaults;
    });
  }

  /** Live state of one vault; null when the API does not know it. */
  async getVault(address: string, chainId: number): Promise<RawVault | null> {
    let data: unknown;
    try {
      data = await this.perform('getVault', () => this.request('getVault', VAULT_QUERY, { address, chainId }));
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    const vault = VaultEnvelope.parse(data).vaultByAddress;
    if (vault === null || vault === undefined) return null;
    return VaultSchema.parse(vault);
  }

  /** Every reallocation into or out of the given markets, oldest first. */
  async listReallocationsByMarkets(chainId: number, uniqueKeys: string[]): Promise<PageResult<RawReallocation>> {
    if (uniqueKeys.length === 0) return { items: [], complete: true, countTotal: 0 };
    return this.paginate(
      'listReallocationsByMarkets',
      this.pageSizes.reallocations,
      ReallocationSchema,
      async (first, skip) => {
        const data = await this.request('listReallocationsByMarkets', REALLOCATIONS_BY_MARKETS_QUERY, {
          first,
          skip,
          chainIds: [chainId],
          keys: uniqueKeys
        });
        return ReallocatesEnvelope.parse(data).vaultReallocates;
      }
    );
  }

  /** Every reallocation made by the given vaults inside the window, oldest first. */
  async listReallocationsByVaults(
    chainId: number,
    addresses: string[],
    window: TimeWindow
  ): Promise<PageResult<RawReallocation>> {
    if (addresses.length === 0) return { items: [], complete: true, countTotal: 0 };
    return this.paginate(
      'listReallocationsByVaults',
      this.pageSizes.reallocations,
      ReallocationSchema,
      async (first, skip) => {
        const data = await this.request('listReallocationsByVaults', REALLOCATIONS_BY_VAULTS_QUERY, {
          first,
          skip,
          chainIds: [chainId],
          vaults: addresses,
          start: window.start,
          end: window.end
        });
        return ReallocatesEnvelope.parse(data).vaultReallocates;
      }
    );
  }

  /** Daily supply and cap series per allocated market; null when the vault is unknown. */
  async getVaultAllocationHistory(
    address: string,
    chainId: number,
    window: TimeWindow
  ): Promise<RawAllocationHistory[] | null> {
    let data: unknown;
    try {
      data = await this.perform('getVaultAllocationHistory', () =>
        this.request('getVaultAllocationHistory', VAULT_ALLOCATION_HISTORY_QUERY, {
          address,
          chainId,
          start: window.start,
          end: window.end
        })
      );
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    const vault = AllocationHistoryEnvelope.parse(data).vaultByAddress;
    if (!vault) return null;
    return this.parseItems('getVaultAllocationHistory', vault.historicalState?.allocation ?? [], AllocationHistorySchema);
  }

  /**
   * Admin events of a vault. Cap events carry their cap and market when the
   * enriched query succeeds; withdraw-queue events carry the new queue when
   * that separate lookup succeeds.
   */
  async listVaultAdminEvents(address: string, chainId: number): Promise<AdminEventsResult> {
    let enriched = true;
    let events = await this.paginateAdminEvents('listVaultAdminEvents', ADMIN_EVENTS_ENRICHED_QUERY, address, chainId);
    if (!events.complete) {
      this.logger.warn('Admin event enrichment failed, falling back to basic event scan', { address, chainId });
      enriched = false;
      events = await this.paginateAdminEvents('listVaultAdminEventsBasic', ADMIN_EVENTS_BASIC_QUERY, address, chainId);
      if (!events.complete) {
        throw new ApiRequestError('listVaultAdminEvents', new Error(`admin events unavailable for ${address}`));
      }
    }

    if (!events.items.some((e) => e.type === 'SetWithdrawQueue')) {
      return { events: events.items, enriched };
    }

    const queues = await this.paginateAdminEvents('listVaultQueueEvents', ADMIN_QUEUE_EVENTS_QUERY, address, chainId);
    if (!queues.complete) {
      this.logger.warn('Withdraw queue lookup failed, queue contents left unknown', { address, chainId });
      return { events: events.items, enriched };
    }

    const queueByEvent = new Map<string, RawAdminEvent>();
    for (const queueEvent of queues.items) {
      if (queueEvent.type === 'SetWithdrawQueue' && queueEvent.hash) {
        queueByEvent.set(`${queueEvent.hash}:${queueEvent.timestamp}`, queueEvent);
      }
    }

    const merged = events.items.map((event) => {
      if (event.type !== 'SetWithdrawQueue' || !event.hash) return event;
      const queue = queueByEvent.get(`${event.hash}:${event.timestamp}`)?.data?.withdrawQueue;
      return queue ? { ...event, data: { ...event.data, withdrawQueue: queue } } : event;
    });
    return { events: merged, enriched };
  }

  /** Daily utilization and liquidity series; null when the market is unknown. */
  async getMarketHistory(uniqueKey: string, chainId: number, window: TimeWindow): Promise<RawMarketHistory | null> {
    let data: unknown;
    try {
      data = await this.perform('getMarketHistory', () =>
        this.request('getMarketHistory', MARKET_HISTORY_QUERY, {
          uniqueKey,
          chainId,
          start: window.start,
          end: window.end
        })
      );
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    return MarketHistoryEnvelope.parse(data).marketByUniqueKey?.historicalState ?? null;
  }

  /** Daily share price and TVL series of a vault; null when the vault is unknown. */
  async getVaultShareHistory(address: string, chainId: number, window: TimeWindow): Promise<RawVaultShareHistory | null> {
    let data: unknown;
    try {
      data = await this.perform('getVaultShareHistory', () =>
        this.request('getVaultShareHistory', VAULT_SHARE_HISTORY_QUERY, {
          address,
          chainId,
          start: window.start,
          end: window.end
        })
      );
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    return VaultShareHistoryEnvelope.parse(data).vaultByAddress?.historicalState ?? null;
  }

  private async paginateAdminEvents(
    op: string,
    document: string,
    address: string,
    chainId: number
  ): Promise<PageResult<RawAdminEvent>> {
    return this.paginate(op, this.pageSizes.adminEvents, AdminEventSchema, async (first, skip) => {
      const data = await this.request(op, document, { address, chainId, first, skip });
      const vault = AdminEventsEnvelope.parse(data).vaultByAddress;
      return vault ? vault.adminEvents : { items: [], pageInfo: { count: 0, countTotal: 0 } };
    });
  }

  /**
   * Walk skip/first pages until an empty page or countTotal is reached. A page
   * that still fails after retries ends the walk with what was collected.
   */
  private async paginate<T>(
    op: string,
    pageSize: number,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fetchPage: (first: number, skip: number) => Promise<Page>
  ): Promise<PageResult<T>> {
    const items: T[] = [];
    let skip = 0;
    let countTotal = 0;

    for (;;) {
      let page: Page;
      try {
        page = await this.perform(op, () => fetchPage(pageSize, skip));
      } catch (err) {
        this.logger.error('Page fetch failed, keeping partial results', {
          operation: op,
          skip,
          collected: items.length,
          error: errorMessage(err)
        });
        return { items, complete: false, countTotal };
      }

      countTotal = page.pageInfo.countTotal;
      if (page.items.length === 0) break;

      items.push(...this.parseItems(op, page.items, schema));
      skip += page.items.length;
      if (skip >= countTotal) break;
    }

    return { items, complete: true, countTotal };
  }

  private parseItems<T>(op: string, rawItems: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    const parsed: T[] = [];
    for (const raw of rawItems) {
      const result = schema.safeParse(raw);
      if (result.success) {
        parsed.push(result.data);
      } else {
        itemsSkippedTotal.inc({ stage: op, reason: 'malformed_record' });
        this.logger.warn('Dropping malformed record', {
          operation: op,
          issues: result.error.issues.slice(0, 3).map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        });
      }
    }
    return parsed;
  }

  private async request(op: string, document: string, variables: Record<string, unknown>): Promise<unknown> {
    this.logger.debug('GraphQL request', { operation: op, variables });
    return this.client.request<unknown>(document, variables);
  }

  private async perform<T>(op: string, fn: () => Promise<T>): Promise<T> {
    const endTimer = apiRequestDuration.startTimer({ operation: op });
    try {
      const result = await this.retry(op, fn);
      apiRequestsTotal.inc({ operation: op, status: 'success' });
      return result;
    } catch (e) {
      apiRequestsTotal.inc({ operation: op, status: 'error' });
      throw e instanceof ApiRequestError ? e : new ApiRequestError(op, e);
    } finally {
      endTimer();
    }
  }

  private async retry<T>(op: string, fn: () => Promise<T>): Promise<T> {
    let lastErr: unknown;
    for (let i = 0; i < this.retryAttempts; i++) {
      await this.budget.acquire();
      try {
        return await fn();
      } catch (err) {
        lastErr = err;
        if (!isRetryableError(err) || i === this.retryAttempts - 1) break;
        apiRetriesTotal.inc({ operation: op });
        const backoff = this.retryBaseMs * Math.pow(2, i) + Math.floor(Math.random() * 25);
        this.logger.warn('Request failed, retrying', {
          operation: op,
          attempt: i + 1,
          backoffMs: backoff,
          error: errorMessage(err)
        });
        await this.sleep(backoff);
      }
    }
    throw lastErr;
  }
}
