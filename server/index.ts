import { createApp } from "./app";
import { loadConfig } from "./config";
import { createCredentialCipher, unavailableCredentialCipher } from "./credentials";
import { createDatabase } from "./db";
import { log } from "./log";
import { DatabaseStorage } from "./storage";
import { EmailDelivery } from "./services/email-delivery";
import { EmailScheduler } from "./services/email-scheduler";
import { SmtpMailTransport } from "./services/mail-transport";
import { SendPipeline } from "./services/send-pipeline";

const config = loadConfig();
const { pool, db } = createDatabase(config.databaseUrl, config.nodeEnv);
const storage = new DatabaseStorage(db);

if (!config.credentialsSecret) {
  console.warn("[CREDENTIALS] CREDENTIALS_SECRET is not set; login passwords will use the placeholder text");
}
const cipher = config.credentialsSecret
  ? createCredentialCipher(config.credentialsSecret)
  : unavailableCredentialCipher;

const delivery = new EmailDelivery(new SmtpMailTransport(config.mail), config.mail);
const pipeline = new SendPipeline({ delivery, cipher, frontendUrl: config.frontendUrl });
const scheduler = new EmailScheduler({ storage, pipeline, delivery });

const { server } = createApp({ config, storage, delivery, cipher, scheduler });

server.listen(config.port, "0.0.0.0", () => {
  log(`serving on ${config.port}`);

  if (!delivery.isConfigured()) {
    console.warn(`[EMAIL] Email not configured. Missing: ${delivery.missingSettings().join(", ")}`);
  }

  if (config.schedulerEnabled) {
    scheduler.start();
  } else {
    log("email scheduler disabled by EMAIL_SCHEDULER_ENABLED", "scheduler");
  }
});

function shutdown(signal: string) {
  log(`${signal} received, shutting down`);
  scheduler.stop();
  server.close(() => {
    pool.end().catch((error) => console.error("[DB] Error closing pool:", error));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
