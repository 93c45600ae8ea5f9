import {
  TOKEN_PROGRAM_ID,
  createInitializeMintInstruction,
  createMintToInstruction
} from '@solana/spl-token';
import { Result, ok } from '../models/api-response.model';
import {
  CreateTokenRequest,
  MintTokenRequest,
  TokenInstructionData
} from '../models/instruction.model';
import { parsePublicKey } from '../utils/pubkey';
import { parseU64 } from '../utils/u64';
import { buildInstruction, toTokenInstructionData } from '../utils/instruction';

/**
 * Builds SPL Token program instructions. Nothing is sent on chain.
 */
export class TokenService {
  /**
   * InitializeMint with no freeze authority
   */
  createMint(request: CreateTokenRequest): Result<TokenInstructionData> {
    const mint = parsePublicKey(request.mint, 'Invalid mint pubkey');
    if (!mint.ok) return mint;

    const mintAuthority = parsePublicKey(request.mintAuthority, 'Invalid mintAuthority pubkey');
    if (!mintAuthority.ok) return mintAuthority;

    const ix = buildInstruction(() =>
      createInitializeMintInstruction(
        mint.value,
        request.decimals,
        mintAuthority.value,
        null,
        TOKEN_PROGRAM_ID
      )
    );
    if (!ix.ok) return ix;

    return ok(toTokenInstructionData(ix.value));
  }

  /**
   * MintTo signed by a single authority (no multisig signers)
   */
  mintTo(request: MintTokenRequest): Result<TokenInstructionData> {
    const mint = parsePublicKey(request.mint, 'Invalid mint pubkey');
    if (!mint.ok) return mint;

    const destination = parsePublicKey(request.destination, 'Invalid destination pubkey');
    if (!destination.ok) return destination;

    const authority = parsePublicKey(request.authority, 'Invalid authority pubkey');
    if (!authority.ok) return authority;

    const amount = parseU64(request.amount, 'amount');
    if (!amount.ok) return amount;

    const ix = buildInstruction(() =>
      createMintToInstruction(
        mint.value,
        destination.value,
        authority.value,
        amount.value,
        [],
        TOKEN_PROGRAM_ID
      )
    );
    if (!ix.ok) return ix;

    return ok(toTokenInstructionData(ix.value));
  }
}
