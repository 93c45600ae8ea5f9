import * as nacl from 'tweetnacl';
import { Keypair } from '@solana/web3.js';
import { Result, ok, fail } from '../models/api-response.model';
import {
  SignMessageRequest,
  SignMessageData,
  VerifyMessageRequest,
  VerifyMessageData
} from '../models/message.model';
import { decodeBase58, decodeBase64, encodeBase58, encodeBase64 } from '../utils/encoding';
import { isValidPublicKey, isValidSignatureEncoding, verifyStrict } from '../utils/ed25519';

const SECRET_KEY_LENGTH = 64;

export class MessageService {
  /**
   * Sign the UTF-8 bytes of a message with a base58 64-byte secret key
   */
  signMessage(request: SignMessageRequest): Result<SignMessageData> {
    const { message, secret } = request;

    const secretBytes = decodeBase58(secret);
    if (!secretBytes.ok || secretBytes.value.length !== SECRET_KEY_LENGTH) {
      return fail('Invalid or malformed secret key (expected 64-byte base58)');
    }

    // Keypair.fromSecretKey checks the public half against the seed
    let keypair: Keypair;
    try {
      keypair = Keypair.fromSecretKey(secretBytes.value);
    } catch {
      return fail('Failed to parse secret key into Keypair');
    }

    const messageBytes = Buffer.from(message, 'utf-8');
    const signature = nacl.sign.detached(messageBytes, keypair.secretKey);

    secretBytes.value.fill(0);

    return ok({
      signature: encodeBase64(signature),
      publicKey: encodeBase58(keypair.publicKey.toBytes()),
      message
    });
  }

  /**
   * Strictly verify a base64 signature over a message against a base58 public key.
   * A signature that does not verify is a successful call with valid=false.
   */
  verifyMessage(request: VerifyMessageRequest): Result<VerifyMessageData> {
    const { message, signature, pubkey } = request;

    const pubkeyBytes = decodeBase58(pubkey);
    if (!pubkeyBytes.ok) {
      return fail('Invalid base58 pubkey');
    }
    if (!isValidPublicKey(pubkeyBytes.value)) {
      return fail('Failed to parse pubkey');
    }

    const signatureBytes = decodeBase64(signature);
    if (!signatureBytes.ok) {
      return fail('Invalid base64 signature');
    }
    if (!isValidSignatureEncoding(signatureBytes.value)) {
      return fail('Failed to parse signature');
    }

    const valid = verifyStrict(
      Buffer.from(message, 'utf-8'),
      signatureBytes.value,
      pubkeyBytes.value
    );

    return ok({ valid, message, pubkey });
  }
}
