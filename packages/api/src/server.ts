// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/server.ts
// The GreenProof REST API server — default localhost:4242.
//
// Endpoints:
//   GET  /v1/health, /v1/status, /v1/audit
//   GET  /v1/token, /v1/balances/:principal[/history]
//   POST /v1/transfers, /v1/trades, /v1/delegates     DELETE /v1/delegates/:delegate
//   POST /v1/actions, /v1/actions/:user/:id/verify    GET /v1/actions/:user[/:id]
//   GET  /v1/pending[/:id]                            PUT /v1/pending/:id/verifier
//   POST /v1/sponsors, /v1/sponsors/contributions     GET /v1/sponsors/:principal
//   GET  /v1/users/:principal/stats, /v1/leaderboard
//   PUT  /v1/admin/contract, /v1/admin/token-uri      GET|POST|DELETE /v1/admin/verifiers
//   GET  /docs                                        Swagger UI (if enabled)

import Fastify, { type FastifyInstance } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { VERSION, type LogLevel } from "@greenproof/core";

import identityPlugin from "./middleware/identity.js";
import actionsRoute from "./routes/actions.js";
import adminRoute from "./routes/admin.js";
import sponsorsRoute from "./routes/sponsors.js";
import statusRoute from "./routes/status.js";
import tokenRoute from "./routes/token.js";
import type { ApiServerOptions } from "./types.js";

const PINO_LEVELS: Record<LogLevel, string> = {
    DEBUG: "debug",
    INFO: "info",
    WARNING: "warn",
    ERROR: "error",
};

export async function createServer(opts: ApiServerOptions): Promise<FastifyInstance> {
    const { contract, config, docs = true } = opts;

    const fastify = Fastify({
        logger:
            opts.logger === false
                ? false
                : {
                      level: PINO_LEVELS[config.logging.level],
                      transport: config.api.prettyLogs
                          ? { target: "pino-pretty", options: { colorize: true } }
                          : undefined,
                  },
    });

    // ── Swagger / OpenAPI docs ──────────────────────────────────────────────────
    if (docs) {
        await fastify.register(swagger, {
            openapi: {
                openapi: "3.0.0",
                info: {
                    title: "GreenProof REST API",
                    description:
                        "Submit environmental actions, verify them and move the reward tokens they mint. " +
                        "State changes name their caller in the x-greenproof-principal header.",
                    version: VERSION,
                },
                servers: [{ url: `http://${config.api.host}:${config.api.port}`, description: "GreenProof ledger" }],
                tags: [
                    { name: "System", description: "Health, status and audit" },
                    { name: "Token", description: "Balances, transfers and delegates" },
                    { name: "Actions", description: "Submission and verification" },
                    { name: "Sponsors", description: "Reward-pool sponsorship" },
                    { name: "Users", description: "Statistics and leaderboard" },
                    { name: "Admin", description: "Owner-only controls" },
                ],
            },
        });

        await fastify.register(swaggerUi, {
            routePrefix: "/docs",
            uiConfig: { docExpansion: "list" },
        });
    }

    // ── Caller identity + optional API key ───────────────────────────────────────
    await fastify.register(identityPlugin, { apiKey: config.api.apiKey });

    // ── Register routes ──────────────────────────────────────────────────────────
    await fastify.register(statusRoute, { contract });
    await fastify.register(tokenRoute, { contract });
    await fastify.register(actionsRoute, { contract });
    await fastify.register(sponsorsRoute, { contract });
    await fastify.register(adminRoute, { contract });

    fastify.addHook("onClose", async () => {
        contract.close();
    });

    return fastify;
}

export async function startServer(opts: ApiServerOptions): Promise<FastifyInstance> {
    const fastify = await createServer(opts);
    const { host, port } = opts.config.api;

    await fastify.listen({ port, host });
    console.log(`\n  GreenProof API  v${VERSION}\n` + `  Listening  → http://${host}:${port}/v1\n`);
    return fastify;
}
