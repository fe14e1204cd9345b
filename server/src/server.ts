import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { connectDB, disconnectDB, isDBConnected } from "./db";
import { OpenRouterChatModel } from "./services/chat";
import { MongoHouseRequestStore } from "./services/houseRequests";
import { GeminiPlanModel } from "./services/planner";
import { MongoChatSessionStore } from "./services/sessions";
import { log } from "./utils/logger";

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    const db = await connectDB(config.MONGODB_URI, config.DB_NAME);

    const app = createApp({
      requests: new MongoHouseRequestStore(db),
      sessions: new MongoChatSessionStore(db),
      chatModel: new OpenRouterChatModel(config.OPENROUTER_API_KEY, config.OPENROUTER_MODEL, config.OPENROUTER_TIMEOUT_MS),
      planModel: new GeminiPlanModel(config.GOOGLE_API_KEY, config.GEMINI_MODEL),
      isDBConnected,
    });

    const server = app.listen(config.PORT, () => {
      log.server(`Listening on http://localhost:${config.PORT}`);
    });

    process.once("SIGINT", () => {
      log.server("Shutting down");
      server.close();
      disconnectDB()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error("db", "Disconnect failed", err);
          process.exit(1);
        });
    });
  } catch (err) {
    log.error("server", "Failed to start", err);
    process.exit(1);
  }
}

void main();
