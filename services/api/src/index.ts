import { loadConfig } from "../../../libs/config/appConfig.js";
import type { AppConfig } from "../../../libs/config/appConfig.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { DB_CONFIG_GUARDS } from "../../../libs/bootstrap/config/db-config.js";
import { AUTH_CONFIG_GUARDS } from "../../../libs/bootstrap/config/auth-config.js";
import { logger } from "../../../libs/logging/logger.js";
import { createDbHandle } from "../../../libs/db/index.js";
import { PgDocumentStore } from "../../../libs/store/pgStore.js";
import { MemoryDocumentStore } from "../../../libs/store/memoryStore.js";
import type { DocumentStore } from "../../../libs/store/documentStore.js";
import { buildResourceDefinitions } from "../../../libs/resource/registry.js";
import type { ResourceDefinition } from "../../../libs/resource/registry.js";
import { createResourceServices } from "../../../libs/resource/resourceService.js";
import { createPolicy } from "../../../libs/auth/policy.js";
import { TokenVerifier } from "../../../libs/auth/tokenVerifier.js";
import { createApp } from "./app.js";

async function createStore(config: AppConfig, definitions: readonly ResourceDefinition[]): Promise<DocumentStore> {
    if (config.storeDriver === 'memory' || !config.db) {
        logger.warn("Using in-process document store; data is lost on restart");
        return new MemoryDocumentStore();
    }

    const store = new PgDocumentStore(createDbHandle(config.db));
    await store.ensureSchema(definitions.flatMap(definition => definition.sortFields));
    return store;
}

async function main() {
    ConfigGuard.enforce([...AUTH_CONFIG_GUARDS, ...DB_CONFIG_GUARDS]);
    const config = loadConfig();

    const definitions = buildResourceDefinitions(config.collections);
    const store = await createStore(config, definitions);
    const policy = createPolicy(config.policy.mode, config.policy.rolePolicyPath);
    const services = createResourceServices(definitions, store, policy);

    const app = createApp({
        services,
        verifier: new TokenVerifier(config.auth),
        enableLogin: config.auth.enableLogin,
        trustProxy: config.trustProxy
    });

    const server = app.listen(config.port, () => {
        logger.info({
            port: config.port,
            storeDriver: config.storeDriver,
            policy: policy.name,
            resources: definitions.map(definition => definition.name)
        }, "Resource API listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => {
            (store.close ? store.close() : Promise.resolve())
                .then(() => process.exit(0))
                .catch(err => {
                    logger.error({ err }, "Failed to close document store");
                    process.exit(1);
                });
        });
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
