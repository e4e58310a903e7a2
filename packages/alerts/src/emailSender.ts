import nodemailer from "nodemailer";
import { SmtpSettings, createLogger } from "@barsignal/core";
import type { AlertSender, SignalAlert } from "./types";

const emailLogger = createLogger("alerts:email");

export interface MailMessage {
	from: string;
	to: string;
	subject: string;
	text: string;
}

/** The part of a nodemailer transporter the sender uses. */
export interface MailTransport {
	sendMail(message: MailMessage): Promise<unknown>;
}

export const createSmtpTransport = (smtp: SmtpSettings): MailTransport =>
	nodemailer.createTransport({
		host: smtp.host,
		port: smtp.port,
		secure: false,
		requireTLS: true,
		auth: { user: smtp.user, pass: smtp.pass },
	});

export class EmailAlertSender implements AlertSender {
	readonly channel = "email";
	private readonly transport: MailTransport;

	constructor(
		private readonly smtp: SmtpSettings,
		transport?: MailTransport
	) {
		this.transport = transport ?? createSmtpTransport(smtp);
	}

	async send(alert: SignalAlert): Promise<void> {
		await this.transport.sendMail({
			from: this.smtp.user,
			to: this.smtp.to,
			subject: alert.subject,
			text: alert.text,
		});
		emailLogger.info("alert_email_sent", {
			symbol: alert.symbol,
			side: alert.side,
			to: this.smtp.to,
		});
	}
}
