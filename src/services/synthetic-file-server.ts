import express from "express";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { createServer, type Server } from "http";
import os from "os";
import path from "path";
import type { SyntheticFile } from "../models/types.js";
import logger from "../utils/logger.js";

/**
 * Firmware names following the vendor/version conventions of the real
 * distribution endpoint.
 */
export const DEFAULT_CATALOG: readonly string[] = [
  // Mellanox
  "sonic-mellanox-20241212.01.bin",
  "sonic-mellanox-20241215.02.bin",
  "sonic-mellanox-202505.01.bin",
  // Broadcom Aboot
  "sonic-aboot-broadcom-20250510.18.swi",
  "sonic-aboot-broadcom-20241201.05.swi",
  // Cisco
  "sonic-cisco-20241201.05.bin",
  "sonic-cisco-20241210.10.bin",
  // Arista
  "sonic-arista-20241205.03.bin",
];

const CONTENT_REPEAT = 100;

/**
 * Deterministic body for a synthetic file: the same name always yields the
 * same bytes.
 */
export function syntheticContent(name: string): string {
  return `SYNTHETIC_FIRMWARE_FILE:${name}\n`.repeat(CONTENT_REPEAT);
}

export function syntheticFile(name: string): SyntheticFile {
  const content = syntheticContent(name);
  return { name, content, size: Buffer.byteLength(content) };
}

export interface SyntheticFileServerOptions {
  /** Port to bind; 0 picks a free one */
  port?: number;
  /** Host name used when composing URLs */
  host?: string;
  /** Interface to bind; all interfaces when omitted */
  bindAddress?: string;
  /** URL path prefix, without slashes */
  prefix?: string;
  catalog?: readonly string[];
  stopTimeoutMs?: number;
}

function closeServer(server: Server, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      logger.warn(`Synthetic file server did not close within ${timeoutMs}ms`);
      resolve();
    }, timeoutMs);
    timer.unref();

    server.close((error) => {
      clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
    server.closeAllConnections();
  });
}

/**
 * Read-only HTTP server for synthetic firmware files
 */
export class SyntheticFileServer {
  private port: number;
  private host: string;
  private bindAddress?: string;
  private prefix: string;
  private catalog: readonly string[];
  private stopTimeoutMs: number;

  private server: Server | null = null;
  private starting: Promise<void> | null = null;
  private tempDir: string | null = null;

  constructor(options: SyntheticFileServerOptions = {}) {
    this.port = options.port ?? 8080;
    this.host = options.host ?? "localhost";
    this.bindAddress = options.bindAddress;
    this.prefix = options.prefix ?? "images";
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    if (!this.starting) {
      this.starting = this.listen().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  async stop(): Promise<void> {
    if (this.starting) {
      try {
        await this.starting;
      } catch (error) {
        logger.warn(`Synthetic file server failed to start: ${error}`);
      }
    }

    // Taken together so a start() during the close keeps its own directory
    const server = this.server;
    const tempDir = this.tempDir;
    this.server = null;
    this.tempDir = null;
    if (server) {
      await closeServer(server, this.stopTimeoutMs);
    }

    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      logger.info("Synthetic file server stopped");
    }
  }

  /**
   * URL of a file as served under the configured host and port. Does not
   * depend on whether the server is running.
   */
  urlFor(filename: string): string {
    return `http://${this.host}:${this.port}/${this.prefix}/${encodeURIComponent(filename)}`;
  }

  async listFiles(): Promise<string[]> {
    if (!this.tempDir) {
      return [];
    }
    const entries = await readdir(path.join(this.tempDir, this.prefix), {
      withFileTypes: true,
    });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /** Port actually bound, or null when not listening */
  boundPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : null;
  }

  private async listen(): Promise<void> {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), "synthetic-files-"));
    try {
      const filesDir = path.join(tempDir, this.prefix);
      await mkdir(filesDir, { recursive: true });
      for (const name of this.catalog) {
        await writeFile(path.join(filesDir, name), syntheticContent(name));
      }
      logger.debug(`Created ${this.catalog.length} synthetic files in ${filesDir}`);

      const app = express();
      app.disable("x-powered-by");
      app.get("/healthz", (_req, res) => {
        res.status(200).send("OK");
      });
      app.use(
        `/${this.prefix}`,
        express.static(filesDir, { index: false, dotfiles: "ignore", redirect: false }),
      );
      app.use((_req, res) => {
        res.status(404).send("Not Found");
      });

      this.server = await new Promise<Server>((resolve, reject) => {
        const server = createServer(app);
        server.once("error", reject);
        server.listen({ port: this.port, host: this.bindAddress }, () => {
          server.off("error", reject);
          resolve(server);
        });
      });
      this.tempDir = tempDir;
    } catch (error) {
      await rm(tempDir, { recursive: true, force: true });
      throw error;
    }

    logger.info(
      `Synthetic file server serving http://${this.host}:${this.boundPort()}/${this.prefix}/`,
    );
  }
}
