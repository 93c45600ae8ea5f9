export interface KeypairData {
  pubkey: string;
  secret: string;
}
