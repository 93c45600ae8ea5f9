import * as nacl from 'tweetnacl';
import { PublicKey } from '@solana/web3.js';
import { KeypairData } from '../models/keypair.model';
import { encodeBase58 } from '../utils/encoding';

export class KeypairService {
  /**
   * Generate a fresh Solana (Ed25519) keypair.
   * The secret is the 64-byte seed || public key, base58-encoded.
   */
  generateKeypair(): KeypairData {
    const keypair = nacl.sign.keyPair();

    const data: KeypairData = {
      pubkey: new PublicKey(keypair.publicKey).toBase58(),
      secret: encodeBase58(keypair.secretKey)
    };

    keypair.secretKey.fill(0);

    return data;
  }
}
