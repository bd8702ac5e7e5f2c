import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { DatabaseClient } from './db/connection.js';
import { IngestionCoordinator } from './ingest/coordinator.js';
import { Metrics } from './metrics/counter.js';
import { AccountStore } from './store/accounts.js';
import { SqliteAlertRecorder } from './store/alerts.js';
import { SqliteContactDirectory } from './store/contacts.js';
import { SqliteHistoryStore } from './store/history.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting HeartWatch service');

    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    const database = new DatabaseClient(config.database.path, config.database.migrationsPath);
    database.open();
    const db = database.getDatabase();

    const metrics = new Metrics();
    const history = new SqliteHistoryStore(db);
    const alerts = new SqliteAlertRecorder(db);
    const contacts = new SqliteContactDirectory(db);

    const coordinator = new IngestionCoordinator(history, alerts, contacts, metrics, {
        thresholds: config.classification.thresholds,
        bpmMax: config.classification.bpmMax,
        escalationWindow: config.classification.escalationWindow,
        defaultLocation: config.alerts.defaultLocation,
    });

    const apiServer = new ApiServer({
        port: config.http.port,
        uploadMaxBytes: config.http.uploadMaxBytes,
        database,
        validator,
        accounts: new AccountStore(db),
        coordinator,
        history,
        alerts,
        contacts,
        metrics,
    });

    await apiServer.start();

    logger.info('HeartWatch service running');

    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await apiServer.stop();
        database.close();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ error: err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
