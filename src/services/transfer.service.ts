import { SystemProgram } from '@solana/web3.js';
import { TOKEN_PROGRAM_ID, createTransferCheckedInstruction } from '@solana/spl-token';
import { Result, ok } from '../models/api-response.model';
import {
  SendSolRequest,
  SendTokenRequest,
  SolInstructionData,
  TokenTransferInstructionData
} from '../models/instruction.model';
import { parsePublicKey } from '../utils/pubkey';
import { parseU64 } from '../utils/u64';
import {
  buildInstruction,
  toSolInstructionData,
  toTokenTransferInstructionData
} from '../utils/instruction';

// Fixed regardless of the mint's configured decimals; no on-chain lookup is made.
export const TRANSFER_DECIMALS = 6;

export class TransferService {
  /**
   * Native System Program lamport transfer
   */
  sendSol(request: SendSolRequest): Result<SolInstructionData> {
    const from = parsePublicKey(request.from, "Invalid 'from' pubkey");
    if (!from.ok) return from;

    const to = parsePublicKey(request.to, "Invalid 'to' pubkey");
    if (!to.ok) return to;

    const lamports = parseU64(request.lamports, 'lamports');
    if (!lamports.ok) return lamports;

    const ix = buildInstruction(() =>
      SystemProgram.transfer({
        fromPubkey: from.value,
        toPubkey: to.value,
        lamports: lamports.value
      })
    );
    if (!ix.ok) return ix;

    return ok(toSolInstructionData(ix.value));
  }

  /**
   * SPL TransferChecked where the owner is both the source account and the authority
   */
  sendToken(request: SendTokenRequest): Result<TokenTransferInstructionData> {
    const destination = parsePublicKey(request.destination, 'Invalid destination pubkey');
    if (!destination.ok) return destination;

    const mint = parsePublicKey(request.mint, 'Invalid mint pubkey');
    if (!mint.ok) return mint;

    const owner = parsePublicKey(request.owner, 'Invalid owner pubkey');
    if (!owner.ok) return owner;

    const amount = parseU64(request.amount, 'amount');
    if (!amount.ok) return amount;

    const ix = buildInstruction(() =>
      createTransferCheckedInstruction(
        owner.value,
        mint.value,
        destination.value,
        owner.value,
        amount.value,
        TRANSFER_DECIMALS,
        [],
        TOKEN_PROGRAM_ID
      )
    );
    if (!ix.ok) return ix;

    return ok(toTokenTransferInstructionData(ix.value));
  }
}
