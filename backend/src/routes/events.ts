import { Router } from "express";
import { TOKEN_EVENT_TYPES, type TokenEventType, type TokenStore } from "@capped-token/sdk";
import { pageQuery, queryString } from "./query";

function isEventType(value: string): value is TokenEventType {
  return TOKEN_EVENT_TYPES.some((t) => t === value);
}

export function eventsRouter(store: TokenStore): Router {
  const router = Router();

  router.get("/events", (req, res) => {
    const type = queryString(req, "type");
    if (type !== undefined && !isEventType(type)) {
      res.status(400).json({ error: `Unknown event type: ${type}` });
      return;
    }
    const events = store.getEvents({ type, ...pageQuery(req) });
    res.json({ events, count: events.length });
  });

  router.get("/operations", (req, res) => {
    const operations = store.getOperations({ actor: queryString(req, "actor"), ...pageQuery(req) });
    res.json({ operations, count: operations.length });
  });

  return router;
}
