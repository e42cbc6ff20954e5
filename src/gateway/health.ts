import { Hono } from "hono";
import { serve } from "@hono/node-server";

/** What the health endpoints report on; implemented by the running bot. */
export interface HealthSource {
  isConnected(): boolean;
  triggerStats(): { guilds: number; total: number };
}

export class HealthServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(
    private readonly source: HealthSource,
    private readonly port: number,
    private readonly hostname: string,
    private readonly version: string,
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => {
      const connected = this.source.isConnected();
      const uptime = Date.now() - this.startedAt;
      return c.json({
        status: connected ? "ok" : "degraded",
        version: this.version,
        uptime,
        uptimeHuman: formatUptime(uptime),
        discord: { connected },
        triggers: this.source.triggerStats(),
      });
    });

    this.app.get("/ready", (c) => {
      if (!this.source.isConnected()) {
        return c.json({ ready: false, reason: "discord not connected" }, 503);
      }
      return c.json({ ready: true });
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
