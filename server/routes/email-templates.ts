import { Router } from "express";
import { z } from "zod";
import {
  EMAIL_TEMPLATE_CATEGORIES,
  EMAIL_TEMPLATE_TYPES,
  customizeTemplateSchema,
  insertEmailTemplateSchema,
  updateEmailTemplateSchema,
} from "@shared/schema";
import { currentUser, requireMasterAdmin } from "../auth";
import { handleRouteError, parseIdParam, parseRequest } from "../errors";
import type { AppDeps } from "../routes";

const listQuerySchema = z.object({
  category: z.enum(EMAIL_TEMPLATE_CATEGORIES).optional(),
  type: z.enum(EMAIL_TEMPLATE_TYPES).optional(),
  search: z.string().optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export function createEmailTemplatesRouter(deps: AppDeps) {
  const router = Router();
  const service = deps.emailTemplateService;

  router.get("/", async (req, res) => {
    try {
      const filters = parseRequest(listQuerySchema, req.query);
      res.json(await service.listVisible(currentUser(req).orgId, filters));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.get("/master", async (req, res) => {
    try {
      const filters = parseRequest(listQuerySchema, req.query);
      res.json(await service.listMasters(filters));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.get("/master/:id", requireMasterAdmin, async (req, res) => {
    try {
      res.json(await service.getMaster(parseIdParam(req.params.id, "template id")));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.post("/master", requireMasterAdmin, async (req, res) => {
    try {
      const input = parseRequest(insertEmailTemplateSchema, req.body);
      res.status(201).json(await service.createMaster(currentUser(req).id, input));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.put("/master/:id", requireMasterAdmin, async (req, res) => {
    try {
      const id = parseIdParam(req.params.id, "template id");
      const input = parseRequest(updateEmailTemplateSchema, req.body);
      res.json(await service.updateMaster(id, input));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.delete("/master/:id", requireMasterAdmin, async (req, res) => {
    try {
      await service.deleteMaster(parseIdParam(req.params.id, "template id"));
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.get("/:id", async (req, res) => {
    try {
      const id = parseIdParam(req.params.id, "template id");
      res.json(await service.getVisible(id, currentUser(req).orgId));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.post("/", async (req, res) => {
    try {
      const input = parseRequest(insertEmailTemplateSchema, req.body);
      const user = currentUser(req);
      res.status(201).json(await service.createOrgTemplate(user.orgId, user.id, input));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.post("/:masterId/customize", async (req, res) => {
    try {
      const masterId = parseIdParam(req.params.masterId, "template id");
      const input = parseRequest(customizeTemplateSchema, req.body);
      const user = currentUser(req);
      const { template, created } = await service.customizeMaster(masterId, user.orgId, user.id, input);
      res.status(created ? 201 : 200).json(template);
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.put("/:id", async (req, res) => {
    try {
      const id = parseIdParam(req.params.id, "template id");
      const input = parseRequest(updateEmailTemplateSchema, req.body);
      res.json(await service.updateOrgTemplate(id, currentUser(req).orgId, input));
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      const id = parseIdParam(req.params.id, "template id");
      await service.deleteOrgTemplate(id, currentUser(req).orgId);
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "EMAIL TEMPLATES");
    }
  });

  return router;
}
