import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import { KeypairService } from './services/keypair.service';
import { MessageService } from './services/message.service';
import { TokenService } from './services/token.service';
import { TransferService } from './services/transfer.service';
import { ApiResponse, toApiResponse } from './models/api-response.model';
import { KeypairData } from './models/keypair.model';
import {
  SignMessageRequest,
  SignMessageData,
  VerifyMessageRequest,
  VerifyMessageData
} from './models/message.model';
import {
  CreateTokenRequest,
  MintTokenRequest,
  SendSolRequest,
  SendTokenRequest,
  TokenInstructionData,
  SolInstructionData,
  TokenTransferInstructionData
} from './models/instruction.model';
import {
  signMessageSchema,
  verifyMessageSchema,
  createTokenSchema,
  mintTokenSchema,
  sendSolSchema,
  sendTokenSchema
} from './schemas/request.schemas';
import { encodeBase64 } from './utils/encoding';
import { registerJsonBodyParser } from './utils/json-body';

export const SERVICE_NAME = 'solana-instruction-service';

const emptyTokenInstruction = (error: string): TokenInstructionData => ({
  program_id: '',
  accounts: [],
  instruction_data: error
});

// /send/* report errors base64-encoded in instruction_data; existing clients decode it
const emptySolInstruction = (error: string): SolInstructionData => ({
  program_id: '',
  accounts: [],
  instruction_data: encodeBase64(error)
});

const emptyTokenTransferInstruction = (error: string): TokenTransferInstructionData => ({
  program_id: '',
  accounts: [],
  instruction_data: encodeBase64(error)
});

/**
 * Build the Fastify application with every route registered.
 * Business failures are always answered with 200 and success=false.
 */
export function buildApp(options: FastifyServerOptions = {}): FastifyInstance {
  const fastify = Fastify(options);
  registerJsonBodyParser(fastify);

  const keypairService = new KeypairService();
  const messageService = new MessageService();
  const tokenService = new TokenService();
  const transferService = new TransferService();

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', service: SERVICE_NAME };
  });

  // ============================================================================
  // KEYS & MESSAGES
  // ============================================================================

  fastify.post<{
    Reply: ApiResponse<KeypairData>
  }>('/keypair', async (request) => {
    const keypair = keypairService.generateKeypair();
    request.log.debug({ pubkey: keypair.pubkey }, 'generated keypair');

    return { success: true, data: keypair };
  });

  fastify.post<{
    Body: SignMessageRequest;
    Reply: ApiResponse<SignMessageData>
  }>('/message/sign', { schema: { body: signMessageSchema } }, async (request) => {
    const result = messageService.signMessage(request.body);
    if (!result.ok) {
      request.log.warn({ reason: result.error }, 'sign rejected');
    }

    return toApiResponse(result, (error) => ({
      signature: '',
      publicKey: '',
      message: error
    }));
  });

  fastify.post<{
    Body: VerifyMessageRequest;
    Reply: ApiResponse<VerifyMessageData>
  }>('/message/verify', { schema: { body: verifyMessageSchema } }, async (request) => {
    const result = messageService.verifyMessage(request.body);
    if (!result.ok) {
      request.log.warn({ reason: result.error }, 'verify rejected');
    }

    return toApiResponse(result, (error) => ({
      valid: false,
      message: error,
      pubkey: request.body.pubkey
    }));
  });

  // ============================================================================
  // INSTRUCTIONS
  // ============================================================================

  fastify.post<{
    Body: CreateTokenRequest;
    Reply: ApiResponse<TokenInstructionData>
  }>('/token/create', { schema: { body: createTokenSchema } }, async (request) => {
    const result = tokenService.createMint(request.body);
    if (!result.ok) {
      request.log.warn({ reason: result.error }, 'token create rejected');
    }

    return toApiResponse(result, emptyTokenInstruction);
  });

  fastify.post<{
    Body: MintTokenRequest;
    Reply: ApiResponse<TokenInstructionData>
  }>('/token/mint', { schema: { body: mintTokenSchema } }, async (request) => {
    const result = tokenService.mintTo(request.body);
    if (!result.ok) {
      request.log.warn({ reason: result.error }, 'token mint rejected');
    }

    return toApiResponse(result, emptyTokenInstruction);
  });

  fastify.post<{
    Body: SendSolRequest;
    Reply: ApiResponse<SolInstructionData>
  }>('/send/sol', { schema: { body: sendSolSchema } }, async (request) => {
    const result = transferService.sendSol(request.body);
    if (!result.ok) {
      request.log.warn({ reason: result.error }, 'sol transfer rejected');
    }

    return toApiResponse(result, emptySolInstruction);
  });

  fastify.post<{
    Body: SendTokenRequest;
    Reply: ApiResponse<TokenTransferInstructionData>
  }>('/send/token', { schema: { body: sendTokenSchema } }, async (request) => {
    const result = transferService.sendToken(request.body);
    if (!result.ok) {
      request.log.warn({ reason: result.error }, 'token transfer rejected');
    }

    return toApiResponse(result, emptyTokenTransferInstruction);
  });

  return fastify;
}
