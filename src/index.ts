#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfigOrExit } from "./config.js";
import { EXPORT_KINDS, buildExport } from "./export.js";
import { loadRecordStore } from "./loader.js";
import { MAX_RADIUS_KM, MIN_RADIUS_KM, parseQuery, runQuery } from "./query.js";
import type { RecordStore } from "./records.js";
import { formatSummaryText } from "./report.js";

// ── Datasets ─────────────────────────────────────────────────────────────────

const config = loadConfigOrExit();

let store: RecordStore | null = null;
let loadError: string | null = null;

try {
  store = await loadRecordStore(config);
  console.error(
    `Loaded ${store.bats.length} bat events, ${store.herps.length} herpetofauna sightings, ` +
      `${store.threatStatus.size} threat status entries from ${config.dataDir}`,
  );
} catch (err) {
  loadError = err instanceof Error ? err.message : String(err);
  console.error(`Data load failed: ${loadError}`);
}

function text(msg: string) {
  return { content: [{ type: "text" as const, text: msg }] };
}

/** The loaded store, or the message explaining why there is none. */
function requireStore(): RecordStore | { error: string } {
  if (store) return store;
  return { error: `Data not loaded. ${loadError ?? ""}`.trim() };
}

const queryInput = {
  coords: z.string().describe("Search origin as 'latitude, longitude', e.g. '-40.2986, 175.7544'"),
  radius: z
    .number()
    .optional()
    .describe(`Search radius in whole km (${MIN_RADIUS_KM}-${MAX_RADIUS_KM}), default ${config.defaultRadiusKm}`),
};

// ── MCP Server ──────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "bioweb-nearby",
  version: "0.1.0",
});

// 1. bioweb_summary
server.registerTool(
  "bioweb_summary",
  {
    description:
      "Summarize bat monitoring events and herpetofauna sightings around a point: counts within the radius, " +
      "nearest records per species across time windows, and threat status of herp species.",
    inputSchema: queryInput,
  },
  async ({ coords, radius }) => {
    const data = requireStore();
    if ("error" in data) return text(`Error: ${data.error}`);
    try {
      const query = parseQuery({ coords, radius: radius ?? config.defaultRadiusKm });
      return text(formatSummaryText(runQuery(data, query)));
    } catch (err) {
      return text(`Error: ${(err as Error).message}`);
    }
  },
);

// 2. bioweb_export
server.registerTool(
  "bioweb_export",
  {
    description:
      "Export one dataset around a point as CSV: raw occurrences within the radius, or the per-species summary.",
    inputSchema: {
      ...queryInput,
      kind: z
        .enum(EXPORT_KINDS)
        .describe("bat_occurrences, bat_summary, herp_occurrences or herp_summary"),
    },
  },
  async ({ coords, radius, kind }) => {
    const data = requireStore();
    if ("error" in data) return text(`Error: ${data.error}`);
    try {
      const query = parseQuery({ coords, radius: radius ?? config.defaultRadiusKm });
      const file = buildExport(data, query, kind);
      if (!file) return text(`No herpetofauna summary data available to download within ${query.radiusKm} km.`);
      return {
        content: [
          {
            type: "resource" as const,
            resource: { uri: `bioweb://exports/${file.filename}`, mimeType: "text/csv", text: file.csv },
          },
        ],
      };
    } catch (err) {
      return text(`Error: ${(err as Error).message}`);
    }
  },
);

// 3. bioweb_status
server.registerTool("bioweb_status", { description: "Report which datasets are loaded" }, async () => {
  const lines = [`Data directory: ${config.dataDir}`];
  if (store) {
    lines.push(
      `Bat events: ${store.bats.length} (${config.batFile})`,
      `Herpetofauna sightings: ${store.herps.length} (${config.herpFile})`,
      `Threat status entries: ${store.threatStatus.size} (${config.threatFile})`,
    );
  } else {
    lines.push(`Not loaded: ${loadError ?? "unknown error"}`);
  }
  lines.push(`Default radius: ${config.defaultRadiusKm} km`);
  return text(lines.join("\n"));
});

// ── Start ───────────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
