/**
 * Loads the repository-level .env file. Imported first by every entry
 * point so the variables are set before any module reads them.
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(here, "../../../.env") });
