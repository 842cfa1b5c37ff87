// backend/services/endpoints/src/bootstrap.ts

/**
 * Side-effect module, imported first by index.ts:
 * loads .env (or ENV_FILE) and stamps SERVICE_NAME so the shared logger
 * tags every line with { service: "endpoints" }.
 */

import { loadEnvFile } from "@shared/src/env";
import { SERVICE_NAME } from "./config";

loadEnvFile();
process.env.SERVICE_NAME = SERVICE_NAME;
