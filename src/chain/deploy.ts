import { loadConfig, parseOrThrow, type Config } from "../config";
import type { GasSchedule } from "../core/gas";
import { applyAuxiliaryCommand, auxiliaryAccounts, createCoGateway } from "../gateway/coGateway";
import { applyOriginCommand, createGateway, originAccounts } from "../gateway/gateway";
import type {
  AuxiliaryCommand,
  AuxiliaryEvent,
  AuxiliaryState,
  OriginCommand,
  OriginEvent,
  OriginState,
} from "../gateway/types";
import { makeLogger, type ILogger } from "../logging";
import {
  auxiliaryDeploymentSchema,
  originDeploymentSchema,
  type AuxiliaryDeployment,
  type LedgerDeployment,
  type OriginDeployment,
} from "../model/validation";
import { Anchor } from "./anchor";
import { createLedger, type Ledger } from "./ledger";
import { ChainRuntime } from "./runtime";

export type OriginChain = ChainRuntime<OriginState, OriginCommand, OriginEvent>;
export type AuxiliaryChain = ChainRuntime<AuxiliaryState, AuxiliaryCommand, AuxiliaryEvent>;

export interface DeployOptions {
  logger?: ILogger;
  gas?: GasSchedule;
  maxStateRoots?: number;
}

const ledgerOf = (d: LedgerDeployment): Ledger =>
  createLedger(
    d.address,
    d.symbol,
    d.allocations.map((a) => [a.holder, a.amount] as const),
  );

/** Boots the origin chain with a fresh Gateway; `input` is validated first. */
export const deployOrigin = (input: unknown, opts: DeployOptions = {}): OriginChain => {
  const d: OriginDeployment = parseOrThrow("origin deployment", originDeploymentSchema, input);
  const genesis = createGateway(
    {
      address: d.gateway,
      coGateway: d.coGateway,
      organization: d.organization,
      burner: d.burner,
      stakeVault: d.stakeVault,
      bounty: d.bounty,
      metadata: d.metadata,
    },
    ledgerOf(d.valueToken),
    ledgerOf(d.baseToken),
  );
  return new ChainRuntime({
    name: "origin",
    genesis,
    reduce: applyOriginCommand,
    accounts: originAccounts,
    anchor: new Anchor(opts.maxStateRoots),
    gas: opts.gas,
    logger: opts.logger,
  });
};

/** Boots the auxiliary chain with a fresh CoGateway. */
export const deployAuxiliary = (input: unknown, opts: DeployOptions = {}): AuxiliaryChain => {
  const d: AuxiliaryDeployment = parseOrThrow(
    "auxiliary deployment",
    auxiliaryDeploymentSchema,
    input,
  );
  const genesis = createCoGateway(
    {
      address: d.coGateway,
      gateway: d.gateway,
      valueToken: d.valueToken,
      organization: d.organization,
      burner: d.burner,
      bounty: d.bounty,
      metadata: d.metadata,
    },
    ledgerOf(d.utilityToken),
    ledgerOf(d.baseCoin),
  );
  return new ChainRuntime({
    name: "auxiliary",
    genesis,
    reduce: applyAuxiliaryCommand,
    accounts: auxiliaryAccounts,
    anchor: new Anchor(opts.maxStateRoots),
    gas: opts.gas,
    logger: opts.logger,
  });
};

export interface Network {
  origin: OriginChain;
  auxiliary: AuxiliaryChain;
  logger: ILogger;
}

/**
 * Boots both chains from one configuration: the logger level and format, the
 * gas schedule and the anchor capacity all come from `config`.
 */
export const deployNetwork = (
  origin: unknown,
  auxiliary: unknown,
  config: Config = loadConfig(),
): Network => {
  const logger = makeLogger({ level: config.logLevel, pretty: config.logPretty });
  const opts: DeployOptions = { logger, gas: config.gas, maxStateRoots: config.maxStateRoots };
  return {
    origin: deployOrigin(origin, opts),
    auxiliary: deployAuxiliary(auxiliary, opts),
    logger,
  };
};
