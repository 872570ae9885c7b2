import express from "express";
import { registerRoutes } from "./routes";

const app = express();
app.use(express.json({ limit: "1mb" }));

(async () => {
  const server = await registerRoutes(app);
  const port = parseInt(process.env.PORT || "5000", 10);
  server.listen(port, "0.0.0.0", () => {
    console.log(`[server] load engine listening on port ${port}`);
  });
})().catch((err: unknown) => {
  console.error("[server] failed to start:", err);
  process.exit(1);
});
