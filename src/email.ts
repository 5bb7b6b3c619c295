import nodemailer from "nodemailer";
import { DeliveryError, errorMessage } from "./errors.js";
import type { NotificationTransport } from "./notifier.js";

export interface EmailTransportOptions {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  sender: string;
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Strip the Telegram Markdown the messages are written in. */
export function toPlainText(markdown: string): string {
  return markdown
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, "$1: $2")
    .replace(/\\([_*`[])/g, "$1")
    .replace(/\*/g, "");
}

export function buildHtml(markdown: string): string {
  const body = markdown
    .split("\n")
    .map((line) => {
      const link = line.match(/^(.*)\[([^\]]+)\]\(([^)]+)\)$/);
      if (link) {
        return `${escapeHtml(toPlainText(link[1]))}<a href="${escapeHtml(link[3])}" style="color:#0066c0;">${escapeHtml(link[2])}</a>`;
      }
      return escapeHtml(toPlainText(line));
    })
    .join("<br/>\n");
  return `
<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Listing Watch</title></head>
<body style="font-family: Arial, sans-serif; max-width: 640px; margin: 0 auto;">
  <p>${body}</p>
  <p style="margin-top:24px; font-size:12px; color:#666;">Sent by Listing Watch</p>
</body>
</html>`;
}

/** SMTP delivery; the recipient is an email address. Subject is the message's first line. */
export function createEmailTransport(options: EmailTransportOptions): NotificationTransport {
  const transporter = nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: options.secure,
    auth: {
      user: options.user,
      pass: options.pass,
    },
  });

  return {
    name: "email",
    async send(recipient, text) {
      const plain = toPlainText(text);
      const subject = plain.split("\n")[0].trim() || "Listing Watch";
      try {
        await transporter.sendMail({
          from: `Listing Watch <${options.sender}>`,
          to: recipient,
          subject,
          html: buildHtml(text),
          text: plain,
        });
      } catch (e) {
        throw new DeliveryError(`SMTP send failed: ${errorMessage(e)}`, { cause: e });
      }
    },
  };
}
