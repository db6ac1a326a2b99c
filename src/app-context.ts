/**
 * Application Context
 *
 * Owns every long-lived object: the database connection, the resolved
 * providers, the acquisition adapter and the pipeline. Built once by
 * `init()` and released by `teardown()`; nothing is constructed at import
 * time.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import knex, { type Knex } from 'knex';

import { ExaAcquisition } from './acquisition/exa';
import { EnvironmentError, loadEnvironment, type ProviderSettings } from './ai/config';
import { createProviderRegistry, type ProviderRegistry } from './ai/providers/registry';
import { FusionPipeline, type FusionPipelineOptions } from './fusion/pipeline';
import { KnexArticleStore, createSchema } from './persistence/knex-article-store';
import { createPrefixedLogger, type Logger } from './utils/logger';

export interface AppContextOptions {
  /** Defaults to `loadEnvironment()` */
  readonly settings?: ProviderSettings;
  /** Overrides the SQLite file from settings */
  readonly knexConfig?: Knex.Config;
  readonly pipeline?: FusionPipelineOptions;
  readonly logger?: Logger;
}

export class AppContext {
  private constructor(
    readonly settings: ProviderSettings,
    readonly db: Knex,
    readonly store: KnexArticleStore,
    readonly providers: ProviderRegistry,
    readonly pipeline: FusionPipeline,
    private readonly log: Logger
  ) {}

  static async init(options: AppContextOptions = {}): Promise<AppContext> {
    const log = options.logger ?? createPrefixedLogger('[AppContext]');
    const settings = options.settings ?? loadEnvironment();
    if (!settings.exaApiKey) {
      throw new EnvironmentError('EXA_API_KEY is required for source acquisition');
    }

    if (!options.knexConfig && settings.databaseFile !== ':memory:') {
      await mkdir(dirname(settings.databaseFile), { recursive: true });
    }

    const db = knex(
      options.knexConfig ?? {
        client: 'better-sqlite3',
        connection: { filename: settings.databaseFile },
        useNullAsDefault: true,
      }
    );

    try {
      await createSchema(db);
    } catch (error) {
      await db.destroy();
      throw error;
    }

    const providers = createProviderRegistry(settings);
    const store = new KnexArticleStore({ knex: db });
    const pipeline = new FusionPipeline(
      {
        acquisition: new ExaAcquisition({ apiKey: settings.exaApiKey }),
        store,
        embedder: providers.embedding,
        taggerModel: providers.generation.model,
      },
      options.pipeline
    );

    log.info(
      `Initialized (embedding: ${providers.embedding.kind}, generation: ${providers.generation.kind})`
    );
    return new AppContext(settings, db, store, providers, pipeline, log);
  }

  async teardown(): Promise<void> {
    await this.db.destroy();
    this.log.info('Torn down');
  }
}
