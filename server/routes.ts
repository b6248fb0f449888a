import type { Express } from "express";
import { createServer, type Server } from "http";
import type { AppConfig } from "./config";
import type { CredentialCipher } from "./credentials";
import { authenticate, requireStaff } from "./auth";
import type { IStorage } from "./storage";
import type { EmailDelivery } from "./services/email-delivery";
import type { EmailScheduler } from "./services/email-scheduler";
import { EmailConfigService } from "./services/email-config-service";
import { EmailTemplateService } from "./services/email-template-service";
import { createEmailConfigRouter } from "./routes/email-config";
import { createScheduledEmailsRouter } from "./routes/scheduled-emails";
import { createEmailTemplatesRouter } from "./routes/email-templates";
import { createTestEmailRouter } from "./routes/test-email";

export interface AppServices {
  config: AppConfig;
  storage: IStorage;
  delivery: EmailDelivery;
  cipher: CredentialCipher;
  scheduler?: EmailScheduler;
  now?: () => Date;
}

export interface AppDeps extends AppServices {
  frontendUrl?: string;
  emailConfigService: EmailConfigService;
  emailTemplateService: EmailTemplateService;
}

export function registerRoutes(app: Express, services: AppServices): Server {
  const deps: AppDeps = {
    ...services,
    frontendUrl: services.config.frontendUrl,
    emailConfigService: new EmailConfigService(services.storage, services.now),
    emailTemplateService: new EmailTemplateService(services.storage),
  };

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", scheduler: deps.scheduler?.isRunning ?? false });
  });

  if (!services.config.sessionSecret) {
    console.warn("[AUTH] SESSION_SECRET is not set; every /api request will be rejected as unauthenticated");
  }
  app.use("/api", authenticate(services.config.sessionSecret));

  app.use("/api/clients", requireStaff, createEmailConfigRouter(deps), createScheduledEmailsRouter(deps));
  app.use("/api/email-templates", requireStaff, createEmailTemplatesRouter(deps));
  app.use("/api/test-email", requireStaff, createTestEmailRouter(deps));

  return createServer(app);
}
