import { config as loadEnv } from 'dotenv';
import fs from 'fs';
import path from 'path';

const envPath = path.resolve(__dirname, '..', '.env.test');

if (fs.existsSync(envPath)) {
	loadEnv({ path: envPath });
}

// Machines log through the console unless a level is configured
if (!process.env.SWITCHYARD_LOG_LEVEL) {
	process.env.SWITCHYARD_LOG_LEVEL = 'silent';
}
