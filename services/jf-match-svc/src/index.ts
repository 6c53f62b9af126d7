import { buildServer, getLogger } from '@jobfit/common';

import { createPgCandidateSupplier, createScanningCandidateSupplier } from './candidate-supplier';
import { CompatibilityEngine } from './compatibility-engine';
import { getMatchServiceConfig } from './config';
import { EmbeddingGateway } from './embedding-gateway';
import { createEmbeddingProvider } from './embedding-provider';
import { instrumentScorer } from './instrumentation';
import { MatchService } from './match-service';
import { PgVectorClient } from './pgvector-client';
import { registerRoutes, type RegisterRoutesOptions } from './routes';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'jf-match-svc';
  const logger = getLogger({ module: 'bootstrap' });

  try {
    // Invalid overrides throw here and stop start-up.
    const config = getMatchServiceConfig();
    const { weights } = config.matching;
    const provider = createEmbeddingProvider({
      settings: config.providers,
      dimensions: config.gateway.dimensions,
      logger: getLogger({ module: 'embedding-provider' })
    });
    const gateway = new EmbeddingGateway({
      provider,
      settings: config.gateway,
      logger: getLogger({ module: 'embedding-gateway' })
    });
    const scorer = instrumentScorer(
      new CompatibilityEngine({ weights, dimensions: config.gateway.dimensions }),
      getLogger({ module: 'compatibility-engine' })
    );
    logger.info(
      { provider: provider.name, model: provider.model, weights, rankingMode: config.matching.rankingMode },
      'Matching components constructed.'
    );

    const server = await buildServer({ disableDefaultHealthRoute: true });

    // Routes read this object, so dependencies can be filled in after listen.
    const state = { isReady: false };
    const dependencies: RegisterRoutesOptions = {
      serviceName: config.base.runtime.serviceName,
      service: null,
      store: null,
      state
    };

    await registerRoutes(server, dependencies);

    const port = config.base.runtime.port;
    await server.listen({ port, host: '0.0.0.0' });
    logger.info({ port }, 'jf-match-svc listening (initializing dependencies...)');

    const store = new PgVectorClient(config.pgvector, getLogger({ module: 'pgvector-client' }));

    const initialize = async (): Promise<void> => {
      await store.initialize();

      const supplier =
        config.matching.rankingMode === 'scan'
          ? createScanningCandidateSupplier(() => store.listActiveJobs())
          : createPgCandidateSupplier(store);

      dependencies.store = store;
      dependencies.service = new MatchService({
        gateway,
        scorer,
        store,
        supplier,
        settings: config.matching,
        logger: getLogger({ module: 'match-service' })
      });

      state.isReady = true;
      logger.info('jf-match-svc fully initialized and ready');
    };

    initialize().catch((error: unknown) => {
      logger.error({ error }, 'Failed to initialize dependencies - service running in degraded mode');
    });

    const shutdown = async (): Promise<void> => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        await store.close();
        logger.info('Server closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to close server gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => {
      void shutdown();
    });
    process.on('SIGINT', () => {
      void shutdown();
    });
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap jf-match-svc.');
    process.exit(1);
  }
}

void bootstrap();
