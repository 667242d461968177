// Response schemas for the Morpho Blue GraphQL API.
// Numeric fields arrive as numbers, decimal strings or null depending on the
// endpoint, so every one of them is coerced with a safe default here.

import { z } from 'zod';

import { itemsSkippedTotal } from '../metrics/index.js';
import { toBigIntSafe, toNumberSafe } from '../utils/decimals.js';

const bigIntField = z.unknown().transform((v) => toBigIntSafe(v));
const nullableBigInt = z
  .unknown()
  .transform((v) => (v === null || v === undefined ? null : toBigIntSafe(v)));
const numberField = z.unknown().transform((v) => toNumberSafe(v, 0));
const nullableNumber = z.unknown().transform((v) => toNumberSafe(v, null));
// Token decimals feed bigint scaling, so a fractional or negative value fails the record.
const decimalsField = z
  .unknown()
  .transform((v) => toNumberSafe(v, 0))
  .pipe(z.number().int().nonnegative().max(255));
const nullableString = z
  .string()
  .nullish()
  .transform((v) => v ?? null);
const addressRef = z
  .object({ address: z.string().nullish() })
  .nullish()
  .transform((v) => v?.address ?? null);

/**
 * Array whose malformed entries are dropped (and counted) instead of failing
 * the enclosing record.
 */
function lenientArray<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string) {
  return z
    .array(z.unknown())
    .nullish()
    .transform((items) => {
      const parsed: T[] = [];
      for (const item of items ?? []) {
        const result = schema.safeParse(item);
        if (result.success) {
          parsed.push(result.data);
        } else {
          itemsSkippedTotal.inc({ stage: 'parse', reason: label });
        }
      }
      return parsed;
    });
}

export const PageInfoSchema = z
  .object({
    count: numberField,
    countTotal: numberField
  })
  .nullish()
  .transform((v) => v ?? { count: 0, countTotal: 0 });

export const AssetSchema = z.object({
  address: z.string(),
  symbol: nullableString,
  decimals: decimalsField,
  priceUsd: nullableNumber
});

export const OracleDataSchema = z
  .object({
    baseFeedOne: addressRef,
    baseFeedTwo: addressRef,
    quoteFeedOne: addressRef,
    quoteFeedTwo: addressRef,
    baseOracleVault: addressRef,
    quoteOracleVault: addressRef,
    scaleFactor: nullableBigInt
  })
  .partial();

export const OracleSchema = z.object({
  address: nullableString,
  type: nullableString,
  data: OracleDataSchema.nullish()
});

export const MarketStateSchema = z.object({
  timestamp: numberField,
  supplyAssets: bigIntField,
  borrowAssets: bigIntField,
  collateralAssets: bigIntField,
  liquidityAssets: bigIntField,
  supplyAssetsUsd: numberField,
  borrowAssetsUsd: numberField,
  collateralAssetsUsd: numberField,
  liquidityAssetsUsd: numberField,
  utilization: numberField,
  price: bigIntField
});

const BadDebtSchema = z
  .object({ underlying: bigIntField, usd: numberField })
  .nullish()
  .transform((v) => v ?? { underlying: 0n, usd: 0 });

const WarningSchema = z.object({
  type: z.string(),
  level: nullableString,
  metadata: z
    .object({ badDebtUsd: nullableNumber, badDebtShare: nullableNumber })
    .partial()
    .nullish()
});

export const MarketSchema = z.object({
  uniqueKey: z.string(),
  listed: z.boolean().nullish(),
  lltv: bigIntField,
  loanAsset: AssetSchema,
  collateralAsset: AssetSchema.nullish(),
  oracle: OracleSchema.nullish(),
  morphoBlue: z.object({
    chain: z.object({ id: z.number(), network: nullableString })
  }),
  state: MarketStateSchema.nullish(),
  badDebt: BadDebtSchema,
  realizedBadDebt: BadDebtSchema,
  warnings: lenientArray(WarningSchema, 'malformed_warning'),
  supplyingVaults: z.array(z.object({ address: z.string() })).nullish()
});

export type RawMarket = z.infer<typeof MarketSchema>;

export const VaultAllocationSchema = z.object({
  market: z.object({
    uniqueKey: z.string(),
    collateralAsset: z.object({ symbol: nullableString }).nullish(),
    loanAsset: z.object({ symbol: nullableString }).nullish()
  }),
  supplyAssets: bigIntField,
  supplyAssetsUsd: numberField,
  supplyCap: bigIntField,
  supplyCapUsd: numberField,
  enabled: z.boolean().nullish(),
  removableAt: nullableNumber,
  pendingSupplyCap: nullableBigInt,
  pendingSupplyCapValidAt: nullableNumber
});

export const VaultSchema = z.object({
  address: z.string(),
  name: nullableString,
  symbol: nullableString,
  listed: z.boolean().nullish(),
  chain: z.object({ id: z.number(), network: nullableString }),
  publicAllocatorConfig: z.object({ fee: nullableNumber }).nullish(),
  state: z
    .object({
      totalAssetsUsd: numberField,
      sharePrice: nullableNumber,
      sharePriceUsd: nullableNumber,
      timelock: numberField,
      curator: nullableString,
      owner: nullableString,
      guardian: nullableString,
      curators: z.array(z.object({ name: nullableString })).nullish(),
      allocation: lenientArray(VaultAllocationSchema, 'malformed_allocation')
    })
    .nullish()
});

export type RawVault = z.infer<typeof VaultSchema>;
export type RawVaultAllocation = z.infer<typeof VaultAllocationSchema>;

export const ReallocationSchema = z.object({
  hash: nullableString,
  timestamp: numberField,
  type: z.string(),
  assets: bigIntField,
  vault: z.object({ address: nullableString }).nullish(),
  market: z.object({ uniqueKey: nullableString }).nullish()
});

export type RawReallocation = z.infer<typeof ReallocationSchema>;

export const TimeseriesPointSchema = z.object({
  x: numberField,
  y: nullableNumber
});

const TimeseriesSchema = z
  .array(TimeseriesPointSchema)
  .nullish()
  .transform((v) => v ?? []);

export const AllocationHistorySchema = z.object({
  market: z.object({ uniqueKey: z.string() }),
  supplyAssetsUsd: TimeseriesSchema,
  supplyCap: TimeseriesSchema
});

export type RawAllocationHistory = z.infer<typeof AllocationHistorySchema>;

export const AdminEventSchema = z.object({
  hash: nullableString,
  timestamp: numberField,
  type: z.string(),
  data: z
    .object({
      cap: nullableBigInt,
      market: z.object({ uniqueKey: nullableString }).nullish(),
      withdrawQueue: z.array(z.object({ uniqueKey: nullableString })).nullish()
    })
    .partial()
    .nullish()
});

export type RawAdminEvent = z.infer<typeof AdminEventSchema>;

export const MarketHistorySchema = z.object({
  utilization: TimeseriesSchema,
  supplyAssetsUsd: TimeseriesSchema,
  borrowAssetsUsd: TimeseriesSchema,
  liquidityAssetsUsd: TimeseriesSchema
});

export type RawMarketHistory = z.infer<typeof MarketHistorySchema>;

export const VaultShareHistorySchema = z.object({
  sharePriceNumber: TimeseriesSchema,
  totalAssetsUsd: TimeseriesSchema
});

export type RawVaultShareHistory = z.infer<typeof VaultShareHistorySchema>;

/** A paginated list envelope: items are validated one by one, not as a whole. */
export const PageSchema = z.object({
  items: z.array(z.unknown()).nullish().transform((v) => v ?? []),
  pageInfo: PageInfoSchema
});
