import { TransactionInstruction } from '@solana/web3.js';
import { Result, ok, fail } from '../models/api-response.model';
import {
  TokenInstructionData,
  SolInstructionData,
  TokenTransferInstructionData
} from '../models/instruction.model';
import { encodeBase64 } from './encoding';

/** Run an instruction builder, turning anything it throws into a failed Result. */
export function buildInstruction(build: () => TransactionInstruction): Result<TransactionInstruction> {
  try {
    return ok(build());
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }
}

export function toTokenInstructionData(ix: TransactionInstruction): TokenInstructionData {
  return {
    program_id: ix.programId.toBase58(),
    accounts: ix.keys.map((meta) => ({
      pubkey: meta.pubkey.toBase58(),
      is_signer: meta.isSigner,
      is_writable: meta.isWritable
    })),
    instruction_data: encodeBase64(ix.data)
  };
}

export function toSolInstructionData(ix: TransactionInstruction): SolInstructionData {
  return {
    program_id: ix.programId.toBase58(),
    accounts: ix.keys.map((meta) => meta.pubkey.toBase58()),
    instruction_data: encodeBase64(ix.data)
  };
}

export function toTokenTransferInstructionData(ix: TransactionInstruction): TokenTransferInstructionData {
  return {
    program_id: ix.programId.toBase58(),
    accounts: ix.keys.map((meta) => ({
      pubkey: meta.pubkey.toBase58(),
      isSigner: meta.isSigner
    })),
    instruction_data: encodeBase64(ix.data)
  };
}
