import http from "node:http";
import type { RecommendationEnvelope, SessionStatus } from "@driveassist/shared/assistant-types";
import { Server as SocketIOServer } from "socket.io";

export interface MonitorEvents {
  "session:status": (status: SessionStatus) => void;
  recommendations: (envelope: RecommendationEnvelope) => void;
}

export type MonitorServer = SocketIOServer<Record<string, never>, MonitorEvents>;

/** Create an HTTP + Socket.IO server that streams session status to dashboards. */
export function createMonitorServer(port: number, getStatus: () => SessionStatus): MonitorServer {
  const httpServer = http.createServer();
  const io: MonitorServer = new SocketIOServer(httpServer, {
    cors: { origin: "*" },
  });

  io.on("connection", (socket) => {
    console.log(`[WS] Client connected: ${socket.id}`);
    socket.emit("session:status", getStatus());
    socket.on("disconnect", () => {
      console.log(`[WS] Client disconnected: ${socket.id}`);
    });
  });

  httpServer.listen(port, () => {
    console.log(`[WS] Monitor server on port ${port}`);
  });

  return io;
}
