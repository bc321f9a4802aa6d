/* eslint-disable prettier/prettier */
import { Router } from "express"
import { pipelineStatusRoutes } from "./routes/pipeline-status.routes.js"
import { latestReadingsRoutes } from "../../../delivery/infrastructure/http/routes/realtime.routes.js"
import { wsStatusRoutes } from "../../../realtime/infrastructure/http/routes/ws-status.routes.js"

/**
 * @file routes.ts
 * @description
 * Root router. Liveness lives here; every module mounts its own router.
 */

const routes = Router()

// ============================================================
// Health
// ============================================================

routes.get("/health", (_req, res) => {
  return res.status(200).json({ status: "ok" })
})

// ============================================================
// Modules
// ============================================================

routes.use(pipelineStatusRoutes)
routes.use(latestReadingsRoutes)
routes.use(wsStatusRoutes)

export { routes }
