import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const emptyDotenvPath = path.join(os.tmpdir(), "pipeline-vitest-empty.env");
if (!fs.existsSync(emptyDotenvPath)) {
  fs.writeFileSync(emptyDotenvPath, "", "utf8");
}

process.env.DOTENV_CONFIG_PATH = emptyDotenvPath;
process.env.DOTENV_CONFIG_OVERRIDE = "false";

// credentials and log settings from the shell do not apply to tests
for (const key of ["OPENAI_API_KEY", "GLADIA_API_KEY", "LOG_LEVEL", "LOG_SCOPES", "LOG_FORMAT"]) {
  delete process.env[key];
}
process.env.LOG_LEVEL = "error";

process.env.NODE_ENV = "test";
