import "dotenv/config";

import { createApp } from "./app";
import { validateEnvironment } from "./middleware";
import { loadCatalogFromFile, loadDefaultCatalog } from "./services/ingredientCatalog";

const config = validateEnvironment();

// a broken catalog stops startup; plans are never computed from partial data
const catalog = config.catalogPath ? loadCatalogFromFile(config.catalogPath) : loadDefaultCatalog();
console.log(`[catalog] ${catalog.size} ingredients loaded from ${config.catalogPath ?? "bundled catalog"}`);

const app = createApp({
  catalog,
  settings: config.planner,
  allowedOrigins: config.allowedOrigins,
  rateLimit: config.rateLimit,
  requestLogging: config.nodeEnv !== "test",
});

app.listen(config.port, () => {
  console.log(`Dog meal planner listening on port ${config.port}`);
});

export default app;
