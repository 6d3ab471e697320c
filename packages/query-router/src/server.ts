import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { buildRouterDeps } from "./providers";
import { createRouter } from "./router";

const config = loadConfig();
const deps = buildRouterDeps(config);

console.log(
  `[Server] classifier=${deps.classifier.id} model=${deps.classifier.modelId}` +
    ` general=${deps.generalProvider ? "on" : "off"} platform=${deps.platformProvider ? "on" : "off"}`,
);

const app = createApp({ router: createRouter(deps), corsOrigins: config.corsOrigins });

app.listen(config.port, () => {
  console.log(`Query router listening on http://localhost:${config.port}`);
});
