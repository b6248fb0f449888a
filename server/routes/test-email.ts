import { Router } from "express";
import { adHocScheduledEmailSchema, testEmailSchema } from "@shared/schema";
import { currentUser } from "../auth";
import { handleRouteError, parseRequest } from "../errors";
import type { AppDeps } from "../routes";
import { formatBody, wrapInLayout } from "../services/template-renderer";

export function createTestEmailRouter(deps: AppDeps) {
  const router = Router();
  const { delivery } = deps;
  const mail = deps.config.mail;

  router.post("/", async (req, res) => {
    try {
      const input = parseRequest(testEmailSchema, req.body);

      if (!delivery.isConfigured()) {
        return res.status(503).json({
          error: "Email service is not configured",
          missing: delivery.missingSettings(),
        });
      }

      const result = await delivery.deliver({
        to: input.toEmail,
        subject: input.subject,
        html: wrapInLayout(formatBody(input.message), mail.fromName),
      });

      if (!result.success) {
        return res.status(500).json({ error: `Failed to send test email: ${result.error}` });
      }

      res.json({ success: true, message: `Test email sent successfully to ${input.toEmail}` });
    } catch (error) {
      handleRouteError(res, error, "TEST EMAIL");
    }
  });

  router.post("/schedule", async (req, res) => {
    try {
      const input = parseRequest(adHocScheduledEmailSchema, req.body);
      const row = await deps.emailConfigService.scheduleAdHoc(currentUser(req).orgId, input);
      res.status(201).json(row);
    } catch (error) {
      handleRouteError(res, error, "TEST EMAIL");
    }
  });

  router.get("/status", (_req, res) => {
    const missing = delivery.missingSettings();
    res.json({
      configured: missing.length === 0,
      missing,
      host: mail.host ?? null,
      port: mail.port,
      fromEmail: mail.fromEmail ?? null,
      fromName: mail.fromName,
      useTls: mail.useTls,
      timeoutSeconds: mail.timeoutSeconds,
      retryAttempts: mail.retryAttempts,
      emailDelaySeconds: mail.emailDelaySeconds,
      schedulerRunning: deps.scheduler?.isRunning ?? false,
    });
  });

  return router;
}
