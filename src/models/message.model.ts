export interface SignMessageRequest {
  message: string;
  secret: string;
}

export interface SignMessageData {
  signature: string;
  publicKey: string;
  message: string;
}

export interface VerifyMessageRequest {
  message: string;
  signature: string;
  pubkey: string;
}

export interface VerifyMessageData {
  valid: boolean;
  message: string;
  pubkey: string;
}
