// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { createServer, startServer } from "./server.js";
export { PRINCIPAL_HEADER } from "./middleware/identity.js";
export { statusFor } from "./reply.js";
export type { ApiServerOptions, ApiErrorBody, StatusResponse } from "./types.js";
