import dotenv from 'dotenv';
dotenv.config();

import { startBot } from './bot';
import { ConfigError, loadConfig } from './config';

console.log('─────────────────────────────');
console.log('  MTProxy Subscription Bot');
console.log('─────────────────────────────');

try {
  startBot(loadConfig(process.env));
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`❌ ${err.message}`);
    process.exit(1);
  }
  throw err;
}
