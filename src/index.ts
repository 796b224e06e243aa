#!/usr/bin/env node
import { startGridApp } from "./bootstrap/grid";

startGridApp().catch((error: unknown) => {
  console.error("启动失败", error);
  process.exit(1);
});
