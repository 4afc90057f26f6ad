import { Hono } from "hono";
import { createChatRoutes } from "./chat.routes.js";
import { createConversationRoutes } from "./conversation.routes.js";
import { createHealthRoutes } from "./health.routes.js";
import type { AppDeps, AppEnv } from "../app.js";

export function createRoutes(deps: AppDeps) {
  const routes = new Hono<AppEnv>();

  routes.route("/", createChatRoutes(deps));
  routes.route("/", createConversationRoutes(deps));
  routes.route("/", createHealthRoutes(deps));

  return routes;
}
