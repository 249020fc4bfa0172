import express from "express";
import path from "path";
import { readFileSync } from "fs";
import swaggerUi from "swagger-ui-express";
import { createApi } from "./api.js";
import { config } from "./config.js";
import { ensureSchema, openDatabase } from "./db.js";

const db = openDatabase(config.dbPath);
ensureSchema(db);

const swaggerDocument = JSON.parse(readFileSync(path.join(process.cwd(), "src", "swagger.json"), "utf8"));

const app = express();

app.use(createApi(db));
app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));

const server = app.listen(config.port, () =>
  console.log(`Report API listening on :${config.port} - docs at http://localhost:${config.port}/docs`)
);

process.on("SIGTERM", () => {
  server.close(() => db.close());
});
