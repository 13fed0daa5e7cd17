import express from "express";
import { createServer } from "node:http";
import { WebSocketServer } from "ws";
import { loadConfig } from "./config";
import { Station } from "./station";
import { log, logError } from "./log";
import { formatSseEvent, heartbeatSseEvent } from "./sse";
import type { StationEvent } from "./types";

const config = loadConfig();
const station = new Station(config);
const runtime = station.getRuntimeState();

const app = express();
app.use(express.json({ limit: "64kb" }));
app.use((req, res, next) => {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
  res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }
  next();
});

const httpServer = createServer(app);
const wsServer = new WebSocketServer({ server: httpServer, path: "/ws" });

function toCompactEvent(event: StationEvent): StationEvent {
  return {
    ts: event.ts,
    event: event.event,
    payload: event.payload
  };
}

runtime.subscribe((event) => {
  const payload = JSON.stringify({ type: "event", event: toCompactEvent(event) });
  for (const client of wsServer.clients) {
    if (client.readyState === 1) {
      client.send(payload);
    }
  }
});

wsServer.on("connection", (socket) => {
  socket.send(JSON.stringify({ type: "snapshot", snapshot: runtime.snapshot() }));
});

app.get("/healthz", (_req, res) => {
  res.json({ ok: true, service: "narrated-stream" });
});

app.get("/status", (_req, res) => {
  res.json(station.status());
});

app.get("/display", (_req, res) => {
  res.json(runtime.snapshot().display);
});

app.get("/cover", (_req, res) => {
  res.setHeader("Cache-Control", "no-store");
  res.sendFile(station.currentCover(), (err) => {
    if (err && !res.headersSent) {
      res.status(404).json({ ok: false, error: "cover unavailable" });
    }
  });
});

app.use("/hls", express.static(station.hlsPlaylistDir(), { maxAge: 0 }));

app.get("/events", (req, res) => {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.flushHeaders?.();

  res.write(
    formatSseEvent({
      ts: new Date().toISOString(),
      event: "snapshot",
      payload: {},
      snapshot: runtime.snapshot()
    })
  );

  const unsubscribe = runtime.subscribe((event) => {
    res.write(formatSseEvent(event));
  });

  const heartbeat = setInterval(() => {
    res.write(heartbeatSseEvent());
  }, 15000);

  req.on("close", () => {
    clearInterval(heartbeat);
    unsubscribe();
    res.end();
  });
});

app.post("/control/start", async (_req, res) => {
  try {
    await station.start();
    res.json({ ok: true });
  } catch (error) {
    logError("control.start.error", error);
    res.status(500).json({ ok: false, error: String(error) });
  }
});

app.post("/control/stop", async (_req, res) => {
  try {
    await station.stop();
    res.json({ ok: true });
  } catch (error) {
    logError("control.stop.error", error);
    res.status(500).json({ ok: false, error: String(error) });
  }
});

app.post("/control/skip", (_req, res) => {
  if (!station.skipCurrent()) {
    res.status(409).json({ ok: false, error: "nothing is playing" });
    return;
  }
  res.json({ ok: true });
});

httpServer.listen(config.port, () => {
  log("server.listen", { port: config.port });
  station.start().catch((error) => logError("station.start.error", error));
});

async function shutdown(signal: string): Promise<void> {
  log("server.shutdown", { signal });
  try {
    await station.stop();
  } catch (error) {
    logError("server.shutdown.error", error);
  }
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
