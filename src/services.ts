// src/services.ts
import path from "path";
import type { AppConfig } from "./config";
import { createPool, poolSource } from "./db";
import { JsonFileStore, type RecordStore } from "./repo/recordStore";
import { PgRecordStore } from "./repo/pgRecordStore";
import { ConfigStore } from "./repo/configStore";
import { AccountService } from "./accounts";
import { CompanyService } from "./companies";
import { PostService } from "./posts";
import { OpenAICompletionClient, PostGenerator, type CompletionClient } from "./generator";
import { SessionSigner } from "./session";
import { createLogger } from "./log";

const log = createLogger("services");

export type AppServices = {
  config: AppConfig;
  store: RecordStore;
  configStore: ConfigStore;
  accounts: AccountService;
  companies: CompanyService;
  posts: PostService;
  generator: PostGenerator;
  signer: SessionSigner;
  now: () => Date;
};

export type ServiceOverrides = {
  store?: RecordStore;
  completionClient?: CompletionClient;
  now?: () => Date;
};

function createStore(config: AppConfig): RecordStore {
  if (config.storeBackend === "postgres") {
    if (!config.databaseUrl) throw new Error("invalid_config: STORE_BACKEND=postgres requires DATABASE_URL");
    log.info("using postgres record store");
    return new PgRecordStore(poolSource(createPool(config.databaseUrl)));
  }
  log.info(`using file record store at ${config.dataDir}`);
  return new JsonFileStore(config.dataDir);
}

/** Wires every service from config; tests swap the store, the completion client and the clock. */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const now = overrides.now ?? (() => new Date());
  const store = overrides.store ?? createStore(config);

  const companies = new CompanyService(store, { now });
  const accounts = new AccountService(store, companies, { bcryptRounds: config.bcryptRounds, now });
  const posts = new PostService(store, accounts, { now });
  const configStore = new ConfigStore(path.join(config.dataDir, "customer_config.json"), {
    ttlMs: config.configCacheTtlMs,
  });

  const client = overrides.completionClient ?? new OpenAICompletionClient(config.openai);
  const generator = new PostGenerator(client, { model: config.openai.model });

  return {
    config,
    store,
    configStore,
    accounts,
    companies,
    posts,
    generator,
    signer: new SessionSigner(config.jwt.secret, config.jwt.expiresIn),
    now,
  };
}
