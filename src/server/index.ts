import http from "http";
import dotenv from "dotenv";
import { loadConfig } from "./config";
import { createHttpApp } from "./http";
import { RoomService } from "./rooms";
import { RoomStore } from "./store";
import { WebSocketGateway } from "./ws";

// Bootstrap that wires the in-memory room store to the HTTP API and the WebSocket push channel.

dotenv.config();
const config = loadConfig(process.env);

const store = new RoomStore();
const service = new RoomService(store, { game: config.game });
const app = createHttpApp(service, store, config);
const server = http.createServer(app);

const gateway = new WebSocketGateway(store);
gateway.attach(server);

server.listen(config.port, () => {
  console.log(`Werewolf host server running on port ${config.port}`);
  console.log("Health check: GET /health");
});
