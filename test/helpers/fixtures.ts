import { ethers } from "ethers";
import { PoolObservation, RouterDescriptor } from "../../src/types/dex";
import { ReceiptLog, SwapReceipt } from "../../src/types/chain";
import { ObservationStore } from "../../src/services/store";

export const WALLET = "0x9000000000000000000000000000000000000009";
export const BASE = "0x4200000000000000000000000000000000000006";
export const TOKEN = "0x7000000000000000000000000000000000000007";

export const V2_ROUTER = "0x1100000000000000000000000000000000000011";
export const V3_ROUTER = "0x1300000000000000000000000000000000000013";
export const V3_FACTORY = "0x3300000000000000000000000000000000000033";
export const V3_QUOTER = "0x3400000000000000000000000000000000000034";
export const SOLIDLY_ROUTER = "0x1500000000000000000000000000000000000015";
export const SOLIDLY_FACTORY = "0x3500000000000000000000000000000000000035";
export const AGGREGATOR_ROUTER = "0x1600000000000000000000000000000000000016";

export const v2Router = (overrides: Partial<RouterDescriptor> = {}): RouterDescriptor => ({
  name: "uniswap_v2",
  address: V2_ROUTER,
  protocolFamily: "V2",
  version: 2,
  ...overrides,
});

export const v3Router = (overrides: Partial<RouterDescriptor> = {}): RouterDescriptor => ({
  name: "uniswap_v3",
  address: V3_ROUTER,
  protocolFamily: "V3",
  version: 3,
  factoryAddress: V3_FACTORY,
  quoterAddress: V3_QUOTER,
  ...overrides,
});

export const solidlyRouter = (overrides: Partial<RouterDescriptor> = {}): RouterDescriptor => ({
  name: "aerodrome",
  address: SOLIDLY_ROUTER,
  protocolFamily: "Solidly",
  version: 2,
  factoryAddress: SOLIDLY_FACTORY,
  ...overrides,
});

export const observation = (overrides: Partial<PoolObservation> = {}): PoolObservation => ({
  venueId: "uniswap",
  priceNative: 0.0001,
  priceUsd: 0.3,
  liquidityUsd: 100_000,
  volume24hUsd: 50_000,
  feeBasisPoints: 30,
  pairOrPoolAddress: "0x5100000000000000000000000000000000000051",
  observedAt: 1_700_000_000_000,
  ...overrides,
});

export class MemoryObservationStore implements ObservationStore {
  readonly entries = new Map<string, PoolObservation[]>();
  readonly ttls = new Map<string, number>();

  async save(token: string, observations: PoolObservation[], ttlSeconds: number): Promise<void> {
    this.entries.set(token.toLowerCase(), observations);
    this.ttls.set(token.toLowerCase(), ttlSeconds);
  }

  async load(token: string): Promise<PoolObservation[]> {
    return this.entries.get(token.toLowerCase()) ?? [];
  }
}

const TRANSFER_EVENT = new ethers.Interface([
  "event Transfer(address indexed from, address indexed to, uint256 value)",
]);

export const transferLog = (token: string, from: string, to: string, value: bigint): ReceiptLog => ({
  address: token,
  ...TRANSFER_EVENT.encodeEventLog("Transfer", [from, to, value]),
});

export const receipt = (
  hash: string,
  logs: ReceiptLog[],
  status: number = 1
): SwapReceipt => ({
  hash,
  status,
  gasUsed: 150_000n,
  gasPrice: 1_000_000_000n,
  logs,
});
