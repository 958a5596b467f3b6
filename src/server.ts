import dotenv from "dotenv";
import { resolveAppConfig } from "./config/appConfig.js";
import { createApp } from "./app.js";
import { EmailAssistant } from "./langgraph/assistant.js";
import { buildEmailGraph } from "./langgraph/graph.js";

dotenv.config();

const appConfig = resolveAppConfig();
// One compiled graph shared by every session; each assistant keeps its own state.
const graph = buildEmailGraph({ flowPath: appConfig.flowPath });

const app = createApp({ createAssistant: () => new EmailAssistant({ graph }) });

app.listen(appConfig.port, () => {
  console.log("=== Server Started ===");
  console.log(`Flow: ${appConfig.flowPath}`);
  console.log(`Server running at http://localhost:${appConfig.port}`);
  console.log(`Test server status at http://localhost:${appConfig.port}/test`);
});
