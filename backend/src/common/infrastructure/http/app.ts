/* eslint-disable prettier/prettier */
// Express 5 handles async errors natively - express-async-errors not needed
import express from "express"
import cors from "cors"

import { routes } from "./routes.js"
import { errorHandler } from "./middlewares/errorHandler.js"

const app = express()

app.use(cors())
app.use(express.json())

app.use(routes)
app.use(errorHandler)

export { app }
