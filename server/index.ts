import express from "express";
import { config } from "./config";
import { db } from "./db";
import { DatabaseStorage } from "./storage";
import { registerRoutes } from "./routes";

const app = express();
app.use(express.json({ limit: '1mb' }));

app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok' });
});

const storage = new DatabaseStorage(db);
const server = registerRoutes(app, storage);

server.listen(config.PORT, '0.0.0.0', () => {
  console.log(`[Server] Listening on port ${config.PORT} (${config.NODE_ENV})`);
});
