import { HttpCreditLedger, type CreditLedger } from "./credit-ledger.js";
import { TokenContractCreditLedger } from "./token-contract.js";

const DEFAULT_CHAIN_RPC_URL = "http://127.0.0.1:8545";

export * from "./credit-ledger.js";
export * from "./token-contract.js";

/**
 * Picks the asset ledger from env: a token contract when ASSET_CONTRACT_ADDRESS
 * is set, else the HTTP ledger at CREDIT_LEDGER_URL, else none.
 */
export function buildCreditLedgerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): CreditLedger | null {
  const assetAddress = env.ASSET_CONTRACT_ADDRESS;
  if (assetAddress) {
    const privateKey = env.CHAIN_PRIVATE_KEY;
    if (!privateKey) {
      throw new Error("CHAIN_PRIVATE_KEY is required when ASSET_CONTRACT_ADDRESS is set");
    }
    return new TokenContractCreditLedger(
      env.CHAIN_RPC_URL || DEFAULT_CHAIN_RPC_URL,
      privateKey,
      assetAddress,
    );
  }

  const ledgerUrl = env.CREDIT_LEDGER_URL;
  if (ledgerUrl) {
    return new HttpCreditLedger(ledgerUrl, env.SERVICE_AUTH_TOKEN);
  }
  return null;
}
