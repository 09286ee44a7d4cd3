// src/server.ts
import app from "./app";
import config from "./config/config";

const PORT = config.port;

const startServer = () => {
  try {
    const server = app.listen(PORT, () => {
      console.log(`Server running on http://localhost:${PORT}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });

    // Large PDFs can take a while to parse
    server.timeout = 120000;

    const shutdown = (signal: string) => {
      console.log(`${signal} received, closing server`);
      server.close(() => process.exit(0));
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

startServer();
