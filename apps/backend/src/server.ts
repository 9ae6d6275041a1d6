import "dotenv/config";
import { AgentFacade } from "./agentFacade.js";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { InMemoryDoctorDirectory } from "./directory/InMemoryDoctorDirectory.js";
import { SEED_DOCTORS } from "./directory/seedDoctors.js";

const config = loadConfig();
const facade = new AgentFacade({ config, directory: new InMemoryDoctorDirectory(SEED_DOCTORS) });
const app = createApp(facade);

const credentials = facade.credentialsStatus();
if (!credentials.configured) {
  console.warn(`[Server] ${credentials.message}; questions will fail until the keys are set`);
}

app.listen(config.port, () => {
  console.log(`Health assistant backend listening on ${config.port}`);
});
