// Body schemas checked by Fastify before a handler runs.
// A body that fails these never reaches a service and gets Fastify's 400.

const pubkey = { type: 'string' } as const;

// Decimal string first so ajv coercion turns integers into strings
// instead of turning large strings into lossy numbers. Integers past 2^53
// already arrive as strings from the body parser.
const u64 = {
  anyOf: [
    { type: 'string', pattern: '^[0-9]+$' },
    { type: 'integer', minimum: 0 }
  ]
} as const;

export const signMessageSchema = {
  type: 'object',
  required: ['message', 'secret'],
  properties: {
    message: { type: 'string' },
    secret: { type: 'string' }
  }
} as const;

export const verifyMessageSchema = {
  type: 'object',
  required: ['message', 'signature', 'pubkey'],
  properties: {
    message: { type: 'string' },
    signature: { type: 'string' },
    pubkey
  }
} as const;

export const createTokenSchema = {
  type: 'object',
  required: ['mintAuthority', 'mint', 'decimals'],
  properties: {
    mintAuthority: pubkey,
    mint: pubkey,
    decimals: { type: 'integer', minimum: 0, maximum: 255 }
  }
} as const;

export const mintTokenSchema = {
  type: 'object',
  required: ['mint', 'destination', 'authority', 'amount'],
  properties: {
    mint: pubkey,
    destination: pubkey,
    authority: pubkey,
    amount: u64
  }
} as const;

export const sendSolSchema = {
  type: 'object',
  required: ['from', 'to', 'lamports'],
  properties: {
    from: pubkey,
    to: pubkey,
    lamports: u64
  }
} as const;

export const sendTokenSchema = {
  type: 'object',
  required: ['destination', 'mint', 'owner', 'amount'],
  properties: {
    destination: pubkey,
    mint: pubkey,
    owner: pubkey,
    amount: u64
  }
} as const;
