import { Facilitator } from "../../src/infra/facilitator";
import { deployNetwork } from "../../src/chain/deploy";
import { loadConfig, type Config } from "../../src/config";
import { GasMeter } from "../../src/core/gas";
import type { CallContext } from "../../src/gateway/types";
import type { StateRootProvider } from "../../src/chain/anchor";
import { makeLogger } from "../../src/logging";
import type { Address, Hex } from "../../src/types";

export const addr = (n: number): Address => `0x${n.toString(16).padStart(40, "0")}`;
export const secret = (n: number): Hex => `0x${n.toString(16).padStart(64, "0")}`;

export const GATEWAY = addr(0x1001);
export const STAKE_VAULT = addr(0x1002);
export const VALUE_TOKEN = addr(0x1003);
export const BASE_TOKEN = addr(0x1004);
export const CO_GATEWAY = addr(0x2001);
export const UTILITY_TOKEN = addr(0x2002);
export const BASE_COIN = addr(0x2003);

export const ORGANIZATION = addr(0xa1);
export const BURNER = addr(0xb1);
export const FACILITATOR = addr(0xf1);
export const STAKER = addr(0x51);
export const BENEFICIARY = addr(0x52);
export const REDEEMER = addr(0x61);

export const BOUNTY = 10n;
export const PENALTY = 15n;
export const METADATA = { name: "Test Value", symbol: "TV", decimals: 18 };
export const LINK_SECRET = secret(0x11);

/** 1000 at gasPrice 2 / gasLimit 100: the fee is always 200. */
export const TERMS = { amount: 1000n, gasPrice: 2n, gasLimit: 100n } as const;

export const silentLogger = makeLogger({ level: "silent" });

export const originDeployment = () => ({
  gateway: GATEWAY,
  coGateway: CO_GATEWAY,
  organization: ORGANIZATION,
  burner: BURNER,
  stakeVault: STAKE_VAULT,
  bounty: BOUNTY,
  metadata: METADATA,
  valueToken: {
    address: VALUE_TOKEN,
    symbol: "TV",
    allocations: [
      { holder: STAKER, amount: 5000n },
      { holder: STAKE_VAULT, amount: 5000n },
    ],
  },
  baseToken: {
    address: BASE_TOKEN,
    symbol: "BT",
    allocations: [{ holder: STAKER, amount: 100n }],
  },
});

export const auxiliaryDeployment = () => ({
  coGateway: CO_GATEWAY,
  gateway: GATEWAY,
  valueToken: VALUE_TOKEN,
  organization: ORGANIZATION,
  burner: BURNER,
  bounty: BOUNTY,
  metadata: METADATA,
  utilityToken: {
    address: UTILITY_TOKEN,
    symbol: "UT",
    allocations: [{ holder: REDEEMER, amount: 5000n }],
  },
  baseCoin: {
    address: BASE_COIN,
    symbol: "BC",
    allocations: [{ holder: REDEEMER, amount: 100n }],
  },
});

/** Both chains booted from the test environment's configuration. */
export const deployPair = (config: Config = loadConfig()) => {
  const { origin, auxiliary, logger } = deployNetwork(
    originDeployment(),
    auxiliaryDeployment(),
    config,
  );
  const facilitator = new Facilitator(origin, auxiliary, FACILITATOR, logger);
  return { origin, auxiliary, facilitator };
};

export const linkedPair = (config?: Config) => {
  const pair = deployPair(config);
  pair.facilitator.linkGateways(ORGANIZATION, LINK_SECRET);
  return pair;
};

/** State roots served from a plain map. */
export class FakeStateRoots implements StateRootProvider {
  readonly roots = new Map<bigint, Hex>();

  getStateRoot(blockHeight: bigint): Hex | undefined {
    return this.roots.get(blockHeight);
  }
}

export const ctxFor = (sender: Address, anchor: StateRootProvider = new FakeStateRoots()): CallContext => ({
  sender,
  gas: new GasMeter(),
  anchor,
});
