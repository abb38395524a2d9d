// Loaded first by every CLI so configuration modules see the .env values
import * as dotenv from "dotenv";

dotenv.config({ path: ".env" }); // load base env
dotenv.config({ path: ".env.local", override: true }); // override with local values if present
