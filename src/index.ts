import { loadCampusConfig } from './config/campusConfig';
import { createPool, Database } from './db';
import { applySchema } from './db/init';
import { createApp } from './app';
import { ConfigurationError } from './utils/errors';
import { logger } from './utils/logger';

async function main() {
    const config = loadCampusConfig();
    const db = new Database(createPool());
    await applySchema(db);

    const port = parseInt(process.env.PORT || '3001', 10);
    const app = createApp({ db, config });

    app.listen(port, () => {
        logger.info({ port, totalCampusArea: config.totalCampusArea, lienDeadline: config.lienDeadline },
            `Ledger API listening on port ${port}`);
    });
}

main().catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
        logger.fatal({ err }, `Invalid configuration: ${err.message}`);
    } else {
        logger.fatal({ err }, 'Server failed to start');
    }
    process.exit(1);
});
