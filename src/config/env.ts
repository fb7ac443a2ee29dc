// src/config/env.ts
// What: Process-wide configuration for the server entry point.
// How: Loads .env via dotenv, then validates process.env through loadConfig().

import 'dotenv/config';
import { loadConfig, type AppConfig } from './schema.js';

const config: AppConfig = loadConfig(process.env);

export type { AppConfig };
export default config;
