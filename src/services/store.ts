import { PoolObservation } from "../types/dex";
import { isRecord } from "../utils/guards";

export interface ObservationStore {
  save(token: string, observations: PoolObservation[], ttlSeconds: number): Promise<void>;
  load(token: string): Promise<PoolObservation[]>;
}

/** The subset of the ioredis client the store uses. */
export interface KeyValueClient {
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
  get(key: string): Promise<string | null>;
}

const isObservation = (value: unknown): value is PoolObservation =>
  isRecord(value) &&
  typeof value.venueId === "string" &&
  typeof value.priceNative === "number" &&
  typeof value.liquidityUsd === "number" &&
  typeof value.feeBasisPoints === "number" &&
  typeof value.pairOrPoolAddress === "string" &&
  typeof value.observedAt === "number";

export class RedisObservationStore implements ObservationStore {
  constructor(private readonly redis: KeyValueClient) {}

  private getRedisKey(token: string): string {
    return `pools:${token.toLowerCase()}`;
  }

  async save(
    token: string,
    observations: PoolObservation[],
    ttlSeconds: number
  ): Promise<void> {
    await this.redis.set(
      this.getRedisKey(token),
      JSON.stringify(observations),
      "EX",
      ttlSeconds
    );
  }

  async load(token: string): Promise<PoolObservation[]> {
    const json = await this.redis.get(this.getRedisKey(token));
    if (!json) return [];
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter(isObservation) : [];
  }
}
