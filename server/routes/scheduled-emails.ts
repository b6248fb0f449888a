import { Router } from "express";
import { z } from "zod";
import { SCHEDULED_EMAIL_STATUSES } from "@shared/schema";
import { currentUser } from "../auth";
import { handleRouteError, parseIdParam, parseRequest } from "../errors";
import type { AppDeps } from "../routes";

const listQuerySchema = z.object({
  status: z.enum(SCHEDULED_EMAIL_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  skip: z.coerce.number().int().min(0).default(0),
});

export function createScheduledEmailsRouter(deps: AppDeps) {
  const router = Router();
  const service = deps.emailConfigService;

  router.get("/:clientId/scheduled-emails", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const query = parseRequest(listQuerySchema, req.query);
      res.json(await service.listScheduledEmails(clientId, currentUser(req).orgId, query));
    } catch (error) {
      handleRouteError(res, error, "SCHEDULED EMAILS");
    }
  });

  router.delete("/:clientId/scheduled-emails/:emailId", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const emailId = parseIdParam(req.params.emailId, "emailId");
      await service.cancelScheduledEmail(clientId, currentUser(req).orgId, emailId);
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "SCHEDULED EMAILS");
    }
  });

  router.post("/:clientId/scheduled-emails/:emailId/retry", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const emailId = parseIdParam(req.params.emailId, "emailId");
      res.json(await service.retryScheduledEmail(clientId, currentUser(req).orgId, emailId));
    } catch (error) {
      handleRouteError(res, error, "SCHEDULED EMAILS");
    }
  });

  return router;
}
