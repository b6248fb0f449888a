import { Router } from "express";
import { emailConfigSchema, recipientCreateSchema, recipientUpdateSchema } from "@shared/schema";
import { currentUser } from "../auth";
import { handleRouteError, parseIdParam, parseRequest } from "../errors";
import type { AppDeps } from "../routes";
import { sendClientCredentials } from "../services/credentials-email";

export function createEmailConfigRouter(deps: AppDeps) {
  const router = Router();
  const service = deps.emailConfigService;

  router.post("/:clientId/email-config", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const config = parseRequest(emailConfigSchema, req.body);
      const created = await service.createConfig(clientId, currentUser(req).orgId, config);
      res.status(201).json(created);
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.put("/:clientId/email-config", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const config = parseRequest(emailConfigSchema, req.body);
      res.json(await service.replaceConfig(clientId, currentUser(req).orgId, config));
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.get("/:clientId/email-config", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      res.json(await service.getConfig(clientId, currentUser(req).orgId));
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.delete("/:clientId/email-config", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      await service.deleteConfig(clientId, currentUser(req).orgId);
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.get("/:clientId/email-config/emails", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      res.json(await service.listRecipients(clientId, currentUser(req).orgId));
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.post("/:clientId/email-config/emails", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const recipient = parseRequest(recipientCreateSchema, req.body);
      res.status(201).json(await service.addRecipient(clientId, currentUser(req).orgId, recipient));
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.get("/:clientId/email-config/emails/:email", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      res.json(await service.getRecipient(clientId, currentUser(req).orgId, req.params.email));
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  // PATCH and PUT take the same body
  for (const method of ["put", "patch"] as const) {
    router[method]("/:clientId/email-config/emails/:email", async (req, res) => {
      try {
        const clientId = parseIdParam(req.params.clientId, "clientId");
        const { selectedTemplates } = parseRequest(recipientUpdateSchema, req.body);
        res.json(await service.updateRecipient(clientId, currentUser(req).orgId, req.params.email, selectedTemplates));
      } catch (error) {
        handleRouteError(res, error, "EMAIL CONFIG");
      }
    });
  }

  router.delete("/:clientId/email-config/emails/:email", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      res.json(await service.removeRecipient(clientId, currentUser(req).orgId, req.params.email));
    } catch (error) {
      handleRouteError(res, error, "EMAIL CONFIG");
    }
  });

  router.post("/:clientId/send-credentials", async (req, res) => {
    try {
      const clientId = parseIdParam(req.params.clientId, "clientId");
      const result = await sendClientCredentials(deps, clientId, currentUser(req).orgId);
      if (!result.success) {
        return res.status(500).json({ success: false, error: result.error, sentTo: result.sentTo });
      }
      res.json({ success: true, message: `Login credentials sent to ${result.sentTo}`, sentTo: result.sentTo });
    } catch (error) {
      handleRouteError(res, error, "EMAIL");
    }
  });

  return router;
}
