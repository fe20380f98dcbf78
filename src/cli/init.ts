import { existsSync } from 'fs';
import { NoteBridgeDatabase } from '../storage/database.js';
import { ConfigManager } from '../utils/config.js';
import { ensureHome, resolveHome } from '../utils/home.js';

export async function initHome(): Promise<void> {
    const home = resolveHome();
    await ensureHome(home.root);

    const configPath = home.config;
    if (!existsSync(configPath)) {
        new ConfigManager(configPath).save();
        console.log(`✓ Created ${configPath}`);
    } else {
        console.log(`Config already exists at ${configPath}`);
    }

    const dbPath = home.database;
    const wasInitialized = existsSync(dbPath);
    const db = new NoteBridgeDatabase(dbPath);
    db.initialize();
    db.close();

    if (!wasInitialized) {
        console.log(`✓ Initialized notebridge at ${home.root}`);
    }
    console.log('');
    console.log(`Add bridges to ${configPath}, then run 'notebridge run'`);
}
