/* eslint-disable prettier/prettier */
import type { Server } from "node:http"

import { app } from "./app.js"
import { createLogger } from "../logger/index.js"

/**
 * @file server.ts
 * @description
 * Binds the Express app to a port. The realtime websocket endpoint is
 * attached to the returned server by the bootstrap.
 */

const log = createLogger("http")

export function startHttpServer(port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port)

    server.once("listening", () => {
      log.info({ port }, "HTTP API listening")
      resolve(server)
    })

    server.once("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        log.error({ port }, "port already in use; stop the process holding it and try again")
      } else {
        log.error({ err }, "HTTP server failed to start")
      }
      reject(err)
    })
  })
}

export function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
    server.closeIdleConnections()
  })
}
