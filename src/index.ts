import { buildApp } from './app';
import { serverConfig } from './config/server.config';

const fastify = buildApp({ logger: { level: serverConfig.logLevel } });

// ============================================================================
// SERVER STARTUP
// ============================================================================

const start = async () => {
  try {
    await fastify.listen({ port: serverConfig.port, host: serverConfig.host });

    fastify.log.info(
      {
        endpoints: [
          'POST /keypair',
          'POST /message/sign',
          'POST /message/verify',
          'POST /token/create',
          'POST /token/mint',
          'POST /send/sol',
          'POST /send/token'
        ]
      },
      'Solana instruction service running'
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

void start();
