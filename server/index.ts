import express from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { createTextGenerator } from "./audit";
import { loadLocalEnvFiles } from "./audit/cli-options";
import { log } from "./audit/logger";

loadLocalEnvFiles();

const app = express();
app.use(express.json());

const httpServer = createServer(app);
await registerRoutes(httpServer, app, {
  textGenerator: createTextGenerator(process.env.OPENAI_API_KEY),
});

const port = parseInt(process.env.PORT || "5000", 10);
httpServer.listen(port, () => {
  log(`serving on port ${port}`, "express");
});
