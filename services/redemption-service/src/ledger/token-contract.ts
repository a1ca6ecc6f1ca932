import { Contract, isError, JsonRpcProvider, Wallet } from "ethers";
import {
  type CreditLedger,
  type CreditLedgerStatus,
  CreditNotAppliedError,
  type CreditResult,
} from "./credit-ledger.js";

/** Minimal ABI of the fungible asset this service mints into. */
export const ASSET_TOKEN_ABI = [
  "function mint(address to, uint256 amount)",
  "function balanceOf(address account) view returns (uint256)",
] as const;

export class TokenContractCreditLedger implements CreditLedger {
  private readonly rpcUrl: string;
  private readonly assetAddress: string;
  private readonly provider: JsonRpcProvider;
  private readonly wallet: Wallet;
  private readonly contract: Contract;

  constructor(rpcUrl: string, privateKey: string, assetAddress: string) {
    this.rpcUrl = rpcUrl;
    this.assetAddress = assetAddress;
    this.provider = new JsonRpcProvider(rpcUrl);
    this.wallet = new Wallet(privateKey, this.provider);
    this.contract = new Contract(assetAddress, ASSET_TOKEN_ABI, this.wallet);
  }

  async credit(holder: string, amount: bigint): Promise<CreditResult> {
    let tx: { hash: string; wait: () => Promise<{ hash: string } | null> };
    try {
      tx = await this.contract.mint(holder, amount);
    } catch (error) {
      // Gas estimation reverts before anything is broadcast.
      if (isError(error, "CALL_EXCEPTION")) {
        throw new CreditNotAppliedError(`mint rejected: ${error.shortMessage}`, { cause: error });
      }
      throw error;
    }

    try {
      const receipt = await tx.wait();
      return { creditRef: receipt?.hash || tx.hash };
    } catch (error) {
      if (isError(error, "CALL_EXCEPTION")) {
        throw new CreditNotAppliedError(`mint ${tx.hash} reverted`, { cause: error });
      }
      throw error;
    }
  }

  async status(): Promise<CreditLedgerStatus> {
    const base: CreditLedgerStatus = {
      kind: "token-contract",
      endpoint: this.rpcUrl,
      assetAddress: this.assetAddress,
      signerAddress: this.wallet.address,
    };
    try {
      return { ...base, latestBlock: await this.provider.getBlockNumber() };
    } catch (error) {
      return { ...base, error: error instanceof Error ? error.message : "unknown_error" };
    }
  }
}
