import {
  Contract,
  JsonRpcProvider,
  Wallet,
  getAddress,
  id,
  isError,
} from "ethers";
import type { TokenOperationPayload } from "@chrono/shared";

const WATCH_REGISTRY_ABI = [
  "function mint(bytes32 operationRef, bytes32 serialHash, address owner)",
  "function transfer(bytes32 operationRef, bytes32 serialHash, address from, address to)",
] as const;

const DEFAULT_CHAIN_RPC_URL = "http://127.0.0.1:8545";

export interface ChainSubmitResult {
  txRef: string;
}

export interface ChainStatusResult {
  configured: boolean;
  rpcUrl?: string;
  registryAddress?: string;
  latestBlock?: number;
  signerAddress?: string;
  error?: string;
}

export type ChainFailureKind = "unavailable" | "rejected";

export class ChainWriteError extends Error {
  constructor(
    readonly kind: ChainFailureKind,
    message: string,
  ) {
    super(message);
    this.name = "ChainWriteError";
  }
}

/** Transport-level failures are worth retrying; anything the node answered is a refusal. */
export function classifyChainError(error: unknown): ChainWriteError {
  if (error instanceof ChainWriteError) return error;
  const message = error instanceof Error ? error.message : "unknown_error";
  if (
    isError(error, "NETWORK_ERROR") ||
    isError(error, "TIMEOUT") ||
    isError(error, "SERVER_ERROR")
  ) {
    return new ChainWriteError("unavailable", message);
  }
  return new ChainWriteError("rejected", message);
}

function toBytes32(value: string): string {
  if (/^0x[0-9a-fA-F]{64}$/.test(value)) return value;
  if (/^[0-9a-fA-F]{64}$/.test(value)) return `0x${value}`;
  return id(value);
}

export interface ChainWriter {
  submit(operationRef: string, payload: TokenOperationPayload): Promise<ChainSubmitResult>;
  status(): Promise<ChainStatusResult>;
}

export class WatchRegistryChainWriter implements ChainWriter {
  private readonly rpcUrl: string;
  private readonly registryAddress: string;
  private readonly provider: JsonRpcProvider;
  private readonly wallet: Wallet;
  private readonly contract: Contract;

  constructor(rpcUrl: string, privateKey: string, registryAddress: string) {
    this.rpcUrl = rpcUrl;
    this.registryAddress = registryAddress;
    this.provider = new JsonRpcProvider(rpcUrl);
    this.wallet = new Wallet(privateKey, this.provider);
    this.contract = new Contract(registryAddress, WATCH_REGISTRY_ABI, this.wallet);
  }

  async submit(operationRef: string, payload: TokenOperationPayload): Promise<ChainSubmitResult> {
    let tx: { hash: string; wait: () => Promise<{ hash: string } | null> };

    try {
      if (payload.kind === "MINT") {
        tx = await this.contract.mint(
          toBytes32(operationRef),
          toBytes32(payload.serialHash),
          getAddress(payload.toKey),
        );
      } else {
        if (!payload.fromKey) {
          throw new ChainWriteError("rejected", "transfer requires fromKey");
        }
        tx = await this.contract.transfer(
          toBytes32(operationRef),
          toBytes32(payload.serialHash),
          getAddress(payload.fromKey),
          getAddress(payload.toKey),
        );
      }

      const receipt = await tx.wait();
      return { txRef: receipt?.hash || tx.hash };
    } catch (error) {
      throw classifyChainError(error);
    }
  }

  async status(): Promise<ChainStatusResult> {
    try {
      const blockNumber = await this.provider.getBlockNumber();
      return {
        configured: true,
        rpcUrl: this.rpcUrl,
        registryAddress: this.registryAddress,
        signerAddress: await this.wallet.getAddress(),
        latestBlock: blockNumber,
      };
    } catch (error) {
      return {
        configured: true,
        rpcUrl: this.rpcUrl,
        registryAddress: this.registryAddress,
        signerAddress: await this.wallet.getAddress(),
        error: error instanceof Error ? error.message : "unknown_error",
      };
    }
  }
}

export function buildChainWriterFromEnv(env: NodeJS.ProcessEnv = process.env): ChainWriter | null {
  const registryAddress = env.WATCH_REGISTRY_ADDRESS;
  if (!registryAddress) return null;

  const privateKey = env.CHAIN_PRIVATE_KEY;
  if (!privateKey) {
    throw new Error("CHAIN_PRIVATE_KEY is required when WATCH_REGISTRY_ADDRESS is set");
  }
  const rpcUrl = env.CHAIN_RPC_URL || DEFAULT_CHAIN_RPC_URL;
  return new WatchRegistryChainWriter(rpcUrl, privateKey, registryAddress);
}
