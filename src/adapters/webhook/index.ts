export { createHttpRevocationWebhook } from "./webhook";
export type { HttpRevocationWebhookOptions } from "./webhook";
export { revocationWebhookPayloadSchema } from "./webhook.schema";
