#!/usr/bin/env tsx
import { handleCLI } from "./cli";

process.on("uncaughtException", (error) => {
  console.error("❌ coi-serve crashed:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("❌ coi-serve unhandled rejection:", reason);
  process.exit(1);
});

handleCLI().catch((error: unknown) => {
  console.error("❌ coi-serve failed:", error);
  process.exit(1);
});
