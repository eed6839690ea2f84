import {
  array,
  bigint,
  custom,
  integer,
  maxValue,
  minLength,
  minValue,
  number,
  object,
  optional,
  pipe,
  string,
  transform,
  type InferOutput,
} from "valibot";
import { isAddress } from "viem";
import { canonicalAddress } from "../core/address";
import type { Address } from "../types";

/** Any spelling of a non-zero address; the output is canonical lowercase. */
export const addressSchema = pipe(
  custom<Address>(
    (v) => typeof v === "string" && isAddress(v, { strict: false }) && !/^0x0{40}$/.test(v),
    "Expected a non-zero 20-byte address.",
  ),
  transform(canonicalAddress),
);

const amountSchema = pipe(bigint(), minValue(0n));

export const tokenMetadataSchema = object({
  name: pipe(string(), minLength(1)),
  symbol: pipe(string(), minLength(1)),
  decimals: pipe(number(), integer(), minValue(0), maxValue(255)),
});

export const ledgerSchema = object({
  address: addressSchema,
  symbol: pipe(string(), minLength(1)),
  allocations: optional(array(object({ holder: addressSchema, amount: amountSchema })), []),
});

export const originDeploymentSchema = object({
  gateway: addressSchema,
  coGateway: addressSchema,
  organization: addressSchema,
  burner: addressSchema,
  stakeVault: addressSchema,
  bounty: amountSchema,
  metadata: tokenMetadataSchema,
  valueToken: ledgerSchema,
  baseToken: ledgerSchema,
});

export const auxiliaryDeploymentSchema = object({
  coGateway: addressSchema,
  gateway: addressSchema,
  /** origin value token, bound into the link terms */
  valueToken: addressSchema,
  organization: addressSchema,
  burner: addressSchema,
  bounty: amountSchema,
  metadata: tokenMetadataSchema,
  utilityToken: ledgerSchema,
  baseCoin: ledgerSchema,
});

export type LedgerDeployment = InferOutput<typeof ledgerSchema>;
export type OriginDeployment = InferOutput<typeof originDeploymentSchema>;
export type AuxiliaryDeployment = InferOutput<typeof auxiliaryDeploymentSchema>;
