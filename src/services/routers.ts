import { ethers } from "ethers";
import { ProtocolFamily, RouterDescriptor, RouterDirectory } from "../types/dex";
import { ConfigError } from "../utils/errors";
import { isRecord } from "../utils/guards";

const FAMILY_BY_TYPE: Record<string, ProtocolFamily> = {
  v2: "V2",
  v3: "V3",
  solidly: "Solidly",
  aggregator: "Aggregator",
};

const keyMatches = (key: string, venueId: string): boolean => {
  const normalizedKey = key.toLowerCase();
  const normalizedId = venueId.toLowerCase();
  return (
    normalizedKey === normalizedId ||
    normalizedKey.split(/[_-]/)[0] === normalizedId
  );
};

/**
 * Resolves a feed venue id to a router. "uniswap" matches both "uniswap_v2"
 * and "uniswap_v3" and picks the highest version; the first entry wins ties.
 */
export function resolveRouter(
  venueId: string,
  directory: RouterDirectory
): RouterDescriptor | undefined {
  let best: RouterDescriptor | undefined;
  for (const [key, descriptor] of Object.entries(directory)) {
    if (!keyMatches(key, venueId)) continue;
    if (!best || descriptor.version > best.version) {
      best = descriptor;
    }
  }
  return best;
}

const optionalAddress = (
  entry: Record<string, unknown>,
  field: string,
  key: string
): string | undefined => {
  const value = entry[field];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !ethers.isAddress(value)) {
    throw new ConfigError(`DEX_ROUTERS.${key}.${field} is not an address`);
  }
  return ethers.getAddress(value);
};

function familyOf(entry: Record<string, unknown>, key: string): ProtocolFamily {
  if (typeof entry.type === "string") {
    const family = FAMILY_BY_TYPE[entry.type.toLowerCase()];
    if (!family) {
      throw new ConfigError(`DEX_ROUTERS.${key}.type '${entry.type}' is unknown`);
    }
    return family;
  }
  if (entry.version === 2) return "V2";
  if (entry.version === 3) return "V3";
  throw new ConfigError(
    `DEX_ROUTERS.${key} needs a 'type' when version is ${String(entry.version)}`
  );
}

/** Builds the directory from the DEX_ROUTERS JSON object. */
export function parseRouterDirectory(raw: unknown): RouterDirectory {
  if (!isRecord(raw)) {
    throw new ConfigError("DEX_ROUTERS must be a JSON object");
  }

  const directory: RouterDirectory = {};
  for (const [key, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) {
      throw new ConfigError(`DEX_ROUTERS.${key} must be an object`);
    }
    const address = optionalAddress(entry, "address", key);
    if (!address) {
      throw new ConfigError(`DEX_ROUTERS.${key}.address is required`);
    }
    if (typeof entry.version !== "number" || !Number.isFinite(entry.version)) {
      throw new ConfigError(`DEX_ROUTERS.${key}.version must be a number`);
    }

    const descriptor: RouterDescriptor = {
      name: key,
      address,
      protocolFamily: familyOf(entry, key),
      version: entry.version,
      factoryAddress: optionalAddress(entry, "factory", key),
      quoterAddress: optionalAddress(entry, "quoter", key),
    };
    if (Array.isArray(entry.feeTiers)) {
      descriptor.feeTiers = entry.feeTiers.filter(
        (fee): fee is number => typeof fee === "number"
      );
    }
    if (typeof entry.supportsFeeOnTransfer === "boolean") {
      descriptor.supportsFeeOnTransfer = entry.supportsFeeOnTransfer;
    }
    directory[key] = descriptor;
  }
  return directory;
}
