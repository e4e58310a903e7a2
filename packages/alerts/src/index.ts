export * from "./format";
export { EmailAlertSender, createSmtpTransport } from "./emailSender";
export type { MailMessage, MailTransport } from "./emailSender";
export { LogAlertSender } from "./logSender";
export type { AlertSender, SignalAlert } from "./types";
