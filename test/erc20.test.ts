import { ethers } from "ethers";
import { ERC20_ABI, Erc20Service } from "../src/services/erc20";
import { LegSubmitter } from "../src/services/submitter";
import { SwapReceipt } from "../src/types/chain";
import { FakeChain, instantRpc } from "./helpers/fakeChain";
import { TOKEN, V2_ROUTER, WALLET, receipt } from "./helpers/fixtures";

const erc20 = new ethers.Interface(ERC20_ABI);

describe("Erc20Service", () => {
  let chain: FakeChain;
  let service: Erc20Service;
  let submitter: LegSubmitter & {
    submit: jest.Mock<Promise<SwapReceipt>, [ethers.TransactionRequest, string]>;
  };

  beforeEach(() => {
    chain = new FakeChain();
    service = new Erc20Service(chain, instantRpc());
    submitter = {
      address: WALLET,
      submit: jest.fn<Promise<SwapReceipt>, [ethers.TransactionRequest, string]>(
        async () => receipt("0xapprove", [])
      ),
    };
  });

  it("reads decimals once per token", async () => {
    chain.on(TOKEN, ERC20_ABI, "decimals", () => [6]);

    await expect(service.decimals(TOKEN)).resolves.toBe(6);
    await expect(service.decimals(TOKEN.toLowerCase())).resolves.toBe(6);

    expect(chain.methodsCalled()).toEqual(["decimals"]);
  });

  it("reads balances", async () => {
    chain.on(TOKEN, ERC20_ABI, "balanceOf", ([owner]) => [owner === WALLET ? 42n : 0n]);

    await expect(service.balanceOf(TOKEN, WALLET)).resolves.toBe(42n);
  });

  it("leaves a sufficient allowance alone", async () => {
    chain.on(TOKEN, ERC20_ABI, "allowance", () => [ethers.MaxUint256]);

    await service.ensureAllowance(submitter, TOKEN, V2_ROUTER, 10n ** 18n);

    expect(submitter.submit).not.toHaveBeenCalled();
  });

  it("approves the maximum amount when the allowance is short", async () => {
    chain.on(TOKEN, ERC20_ABI, "allowance", () => [5n]);

    await service.ensureAllowance(submitter, TOKEN, V2_ROUTER, 10n);

    expect(submitter.submit).toHaveBeenCalledTimes(1);
    const [request, label] = submitter.submit.mock.calls[0];
    expect(request.to).toBe(TOKEN);
    expect(label).toBe(`approve ${TOKEN}`);
    const approve = erc20.parseTransaction({ data: request.data ?? "0x" });
    expect(approve?.name).toBe("approve");
    expect(approve?.args[0]).toBe(V2_ROUTER);
    expect(approve?.args[1]).toBe(ethers.MaxUint256);
  });

  it("fails when the approval reverts", async () => {
    chain.on(TOKEN, ERC20_ABI, "allowance", () => [0n]);
    submitter.submit.mockResolvedValue(receipt("0xfailed", [], 0));

    await expect(service.ensureAllowance(submitter, TOKEN, V2_ROUTER, 1n)).rejects.toThrow(
      `Approval of ${TOKEN} for ${V2_ROUTER} reverted (0xfailed)`
    );
  });
});
