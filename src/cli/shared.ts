import { NoteBridgeDatabase } from '../storage/database.js';
import { ConfigManager } from '../utils/config.js';
import { ensureHome, resolveHome } from '../utils/home.js';
import { Logger, LogLevel, parseLogLevel } from '../utils/logger.js';

/**
 * Ensure NOTEBRIDGE_HOME and open the database with its schema in place
 */
export async function openDatabase(): Promise<NoteBridgeDatabase> {
    const home = resolveHome();
    await ensureHome(home.root);
    const db = new NoteBridgeDatabase(home.database);
    db.initialize();
    return db;
}

export function loadConfig(path?: string): ConfigManager {
    return new ConfigManager(path ?? resolveHome().config);
}

export function createLogger(verbose?: boolean): Logger {
    return new Logger(verbose ? LogLevel.DEBUG : parseLogLevel(process.env.NOTEBRIDGE_LOG_LEVEL));
}
