import { ethers } from "ethers";
import { parseRouterDirectory, resolveRouter } from "../src/services/routers";
import { ConfigError } from "../src/utils/errors";
import { RouterDirectory } from "../src/types/dex";
import { V2_ROUTER, V3_ROUTER, v2Router, v3Router } from "./helpers/fixtures";

describe("resolveRouter", () => {
  const v2 = v2Router();
  const v3 = v3Router();

  it("picks the highest version among prefix matches", () => {
    const directory: RouterDirectory = { uniswap_v2: v2, uniswap_v3: v3 };
    expect(resolveRouter("uniswap", directory)).toBe(v3);
  });

  it("returns nothing for an unknown venue", () => {
    expect(resolveRouter("pancakeswap", { uniswap_v2: v2 })).toBeUndefined();
  });

  it("matches the full key case-insensitively", () => {
    const directory: RouterDirectory = { uniswap_v2: v2, uniswap_v3: v3 };
    expect(resolveRouter("UNISWAP_V2", directory)).toBe(v2);
  });

  it("matches hyphenated keys by their first segment", () => {
    const sushi = v2Router({ name: "sushi-v2" });
    expect(resolveRouter("sushi", { "sushi-v2": sushi })).toBe(sushi);
  });

  it("keeps the first entry when versions tie", () => {
    const first = v2Router({ name: "first" });
    const second = v2Router({ name: "second" });
    expect(resolveRouter("base", { base_a: first, base_b: second })).toBe(first);
  });
});

describe("parseRouterDirectory", () => {
  it("derives the protocol family from type or version", () => {
    const directory = parseRouterDirectory({
      uniswap_v2: { address: V2_ROUTER, version: 2 },
      uniswap_v3: { address: V3_ROUTER, version: 3, feeTiers: [500, 3000] },
      aerodrome: {
        address: "0x1500000000000000000000000000000000000015",
        version: 2,
        type: "solidly",
        factory: "0x3500000000000000000000000000000000000035",
        supportsFeeOnTransfer: true,
      },
    });

    expect(directory.uniswap_v2.protocolFamily).toBe("V2");
    expect(directory.uniswap_v3.protocolFamily).toBe("V3");
    expect(directory.uniswap_v3.feeTiers).toEqual([500, 3000]);
    expect(directory.aerodrome).toEqual({
      name: "aerodrome",
      address: "0x1500000000000000000000000000000000000015",
      protocolFamily: "Solidly",
      version: 2,
      factoryAddress: "0x3500000000000000000000000000000000000035",
      quoterAddress: undefined,
      supportsFeeOnTransfer: true,
    });
  });

  it("checksums addresses", () => {
    const lower = "0xcf77a3ba9a5ca399b7c97c74d54e5b1beb874e43";
    const directory = parseRouterDirectory({ router: { address: lower, version: 2 } });
    expect(directory.router.address).toBe(ethers.getAddress(lower));
    expect(directory.router.address).not.toBe(lower);
  });

  it("rejects entries without an address", () => {
    expect(() => parseRouterDirectory({ broken: { version: 2 } })).toThrow(ConfigError);
  });

  it("rejects unknown protocol types", () => {
    expect(() =>
      parseRouterDirectory({ odd: { address: V2_ROUTER, version: 1, type: "curve" } })
    ).toThrow("DEX_ROUTERS.odd.type 'curve' is unknown");
  });

  it("requires a type for versions other than 2 and 3", () => {
    expect(() => parseRouterDirectory({ agg: { address: V2_ROUTER, version: 6 } })).toThrow(
      ConfigError
    );
  });
});
