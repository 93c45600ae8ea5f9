import request from 'supertest';
import bs58 from 'bs58';
import { FastifyInstance } from 'fastify';
import { Keypair } from '@solana/web3.js';
import { buildApp, SERVICE_NAME } from '../../src/app';

describe('HTTP API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp({ logger: false });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  const pubkey = () => Keypair.generate().publicKey.toBase58();

  describe('GET /health', () => {
    it('should return OK', async () => {
      const response = await request(app.server).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', service: SERVICE_NAME });
    });
  });

  describe('POST /keypair', () => {
    it('should return a base58 keypair', async () => {
      const response = await request(app.server).post('/keypair');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(bs58.decode(response.body.data.pubkey)).toHaveLength(32);
      expect(bs58.decode(response.body.data.secret)).toHaveLength(64);
    });

    it('should accept an empty JSON body', async () => {
      const response = await request(app.server)
        .post('/keypair')
        .set('Content-Type', 'application/json')
        .send('');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(bs58.decode(response.body.data.pubkey)).toHaveLength(32);
    });
  });

  describe('JSON body parsing', () => {
    it('should keep JSON integers above 2^53 exact', async () => {
      const body = `{"from":"${pubkey()}","to":"${pubkey()}","lamports":9007199254740993}`;

      const response = await request(app.server)
        .post('/send/sol')
        .set('Content-Type', 'application/json')
        .send(body);

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      const data = Buffer.from(response.body.data.instruction_data, 'base64');
      expect(data.readBigUInt64LE(4)).toBe(9007199254740993n);
    });

    it('should report a JSON integer above u64 through the error convention', async () => {
      const body = `{"from":"${pubkey()}","to":"${pubkey()}","lamports":18446744073709551616}`;

      const response = await request(app.server)
        .post('/send/sol')
        .set('Content-Type', 'application/json')
        .send(body);

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(false);
      expect(Buffer.from(response.body.data.instruction_data, 'base64').toString()).toBe(
        'Invalid lamports (expected unsigned 64-bit integer)'
      );
    });

    it('should reject malformed JSON with 400', async () => {
      const response = await request(app.server)
        .post('/send/sol')
        .set('Content-Type', 'application/json')
        .send('{"from":');

      expect(response.status).toBe(400);
    });
  });

  describe('Message flow', () => {
    it('should sign and verify a message end to end', async () => {
      const keypair = (await request(app.server).post('/keypair')).body.data;

      const signed = await request(app.server)
        .post('/message/sign')
        .send({ message: 'Hello, Solana!', secret: keypair.secret });

      expect(signed.status).toBe(200);
      expect(signed.body.success).toBe(true);
      expect(signed.body.data.publicKey).toBe(keypair.pubkey);
      expect(signed.body.data.message).toBe('Hello, Solana!');

      const verified = await request(app.server)
        .post('/message/verify')
        .send({
          message: 'Hello, Solana!',
          signature: signed.body.data.signature,
          pubkey: keypair.pubkey
        });

      expect(verified.status).toBe(200);
      expect(verified.body).toEqual({
        success: true,
        data: { valid: true, message: 'Hello, Solana!', pubkey: keypair.pubkey }
      });
    });

    it('should put the sign failure reason in the message field with status 200', async () => {
      const response = await request(app.server)
        .post('/message/sign')
        .send({ message: 'hello', secret: bs58.encode(new Uint8Array(10)) });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: false,
        data: {
          signature: '',
          publicKey: '',
          message: 'Invalid or malformed secret key (expected 64-byte base58)'
        }
      });
    });

    it('should echo the pubkey back when it is not base58', async () => {
      const response = await request(app.server)
        .post('/message/verify')
        .send({ message: 'hello', signature: 'AAAA', pubkey: 'I0lO' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: false,
        data: { valid: false, message: 'Invalid base58 pubkey', pubkey: 'I0lO' }
      });
    });
  });

  describe('POST /token/create', () => {
    it('should return verbose account metas', async () => {
      const mint = pubkey();
      const response = await request(app.server)
        .post('/token/create')
        .send({ mintAuthority: pubkey(), mint, decimals: 6 });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.program_id).toBe('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');
      expect(response.body.data.accounts[0]).toEqual({ pubkey: mint, is_signer: false, is_writable: true });
    });

    it('should return the raw error text for an invalid mint', async () => {
      const response = await request(app.server)
        .post('/token/create')
        .send({ mintAuthority: pubkey(), mint: 'invalid', decimals: 6 });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: false,
        data: { program_id: '', accounts: [], instruction_data: 'Invalid mint pubkey' }
      });
    });

    it('should let Fastify reject decimals above 255', async () => {
      const response = await request(app.server)
        .post('/token/create')
        .send({ mintAuthority: pubkey(), mint: pubkey(), decimals: 256 });

      expect(response.status).toBe(400);
    });
  });

  describe('POST /token/mint', () => {
    it('should return the raw error text for an invalid authority', async () => {
      const response = await request(app.server)
        .post('/token/mint')
        .send({ mint: pubkey(), destination: pubkey(), authority: 'nope', amount: 10 });

      expect(response.body).toEqual({
        success: false,
        data: { program_id: '', accounts: [], instruction_data: 'Invalid authority pubkey' }
      });
    });

    it('should accept amounts above 2^53 as strings', async () => {
      const response = await request(app.server)
        .post('/token/mint')
        .send({ mint: pubkey(), destination: pubkey(), authority: pubkey(), amount: '9007199254740993' });

      expect(response.body.success).toBe(true);
      const data = Buffer.from(response.body.data.instruction_data, 'base64');
      expect(data.readBigUInt64LE(1)).toBe(9007199254740993n);
    });
  });

  describe('POST /send/sol', () => {
    it('should build a lamport transfer', async () => {
      const from = pubkey();
      const to = pubkey();

      const response = await request(app.server)
        .post('/send/sol')
        .send({ from, to, lamports: 1000 });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: {
          program_id: '11111111111111111111111111111111',
          accounts: [from, to],
          instruction_data: 'AgAAAOgDAAAAAAAA'
        }
      });
    });

    it('should base64-encode the error text', async () => {
      const response = await request(app.server)
        .post('/send/sol')
        .send({ from: 'bad', to: pubkey(), lamports: 1000 });

      expect(response.body).toEqual({
        success: false,
        data: { program_id: '', accounts: [], instruction_data: 'SW52YWxpZCAnZnJvbScgcHVia2V5' }
      });
      expect(Buffer.from(response.body.data.instruction_data, 'base64').toString()).toBe("Invalid 'from' pubkey");
    });

    it('should let Fastify reject a missing field', async () => {
      const response = await request(app.server)
        .post('/send/sol')
        .send({ from: pubkey(), to: pubkey() });

      expect(response.status).toBe(400);
    });
  });

  describe('POST /send/token', () => {
    it('should return compact account metas', async () => {
      const owner = pubkey();
      const mint = pubkey();
      const destination = pubkey();

      const response = await request(app.server)
        .post('/send/token')
        .send({ destination, mint, owner, amount: 250 });

      expect(response.body).toEqual({
        success: true,
        data: {
          program_id: 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA',
          accounts: [
            { pubkey: owner, isSigner: false },
            { pubkey: mint, isSigner: false },
            { pubkey: destination, isSigner: false },
            { pubkey: owner, isSigner: true }
          ],
          instruction_data: 'DPoAAAAAAAAABg=='
        }
      });
    });

    it('should base64-encode the error text for an invalid owner', async () => {
      const response = await request(app.server)
        .post('/send/token')
        .send({ destination: pubkey(), mint: pubkey(), owner: 'bad', amount: 1 });

      expect(response.body).toEqual({
        success: false,
        data: { program_id: '', accounts: [], instruction_data: 'SW52YWxpZCBvd25lciBwdWJrZXk=' }
      });
    });
  });
});
