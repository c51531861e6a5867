import http from "http";
import { loadServerConfig } from "./config";
import { createHttpApp } from "./http";
import { GameStore } from "./store";
import { WebSocketGateway } from "./ws";

// Bootstrap that wires the in-memory store to the HTTP + WebSocket layers.

const config = loadServerConfig();

const store = new GameStore();
const app = createHttpApp(store, { pageLimits: config.pageLimits });
const server = http.createServer(app);

const gateway = new WebSocketGateway(store);
gateway.attach(server);

server.listen(config.port, config.host, () => {
  console.log(`Mafia resolution server running on ${config.host}:${config.port}`);
  console.log("Health check: GET /health");
});
