// u64 fields arrive as a JSON integer or, above 2^53, a decimal string
export type U64Input = number | string;

export interface CreateTokenRequest {
  mintAuthority: string;
  mint: string;
  decimals: number;
}

export interface MintTokenRequest {
  mint: string;
  destination: string;
  authority: string;
  amount: U64Input;
}

export interface SendSolRequest {
  from: string;
  to: string;
  lamports: U64Input;
}

export interface SendTokenRequest {
  destination: string;
  mint: string;
  owner: string;
  amount: U64Input;
}

/** Verbose account meta used by /token/create and /token/mint. */
export interface AccountMetaData {
  pubkey: string;
  is_signer: boolean;
  is_writable: boolean;
}

/** Compact account meta used by /send/token. */
export interface CompactAccountMetaData {
  pubkey: string;
  isSigner: boolean;
}

export interface TokenInstructionData {
  program_id: string;
  accounts: AccountMetaData[];
  instruction_data: string;
}

export interface SolInstructionData {
  program_id: string;
  accounts: string[];
  instruction_data: string;
}

export interface TokenTransferInstructionData {
  program_id: string;
  accounts: CompactAccountMetaData[];
  instruction_data: string;
}
