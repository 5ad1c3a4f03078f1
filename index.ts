import 'dotenv/config';

// Load centralized configuration
import { config, validateConfig } from './config';
import logger from './utils/logger';
import MigrationService from './services/migration/migrationService';
import { SourceListError } from './services/migration/sourceList';
import { LOG } from './utils/constants';
import { serializeError } from './utils/errorHandler';

async function main(): Promise<void> {
    logger.info(LOG.BANNER);
    logger.info('Drive to GitHub Release Migrator', { environment: config.env });
    logger.info(LOG.BANNER);

    validateConfig();

    const service = new MigrationService();
    try {
        await service.run({
            listFile: config.paths.driveFile,
            tempDir: config.paths.tmp
        });
    } catch (error: unknown) {
        if (error instanceof SourceListError) {
            logger.error(`❌ ${error.message}`, { filePath: error.filePath });
            process.exitCode = 1;
            return;
        }
        throw error;
    }
}

main().catch((error: unknown) => {
    logger.error('❌ Migration aborted', { error: serializeError(error) });
    process.exitCode = 1;
});
