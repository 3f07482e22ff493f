import { Resend } from "resend";

import { env } from "@/lib/env";

const resend = env.RESEND_API_KEY ? new Resend(env.RESEND_API_KEY) : null;

export const ADMIN_ALERT_TIMEOUT_MS = 12_000;

export async function sendAdminAlert(subject: string, html: string): Promise<void> {
  if (!resend || !env.ALERT_FROM_EMAIL || !env.ALERT_TO_EMAIL) {
    console.warn("[alerts] missing resend configuration", { subject });
    return;
  }

  const { error } = await resend.emails.send({
    from: env.ALERT_FROM_EMAIL,
    to: env.ALERT_TO_EMAIL,
    subject,
    html
  });

  if (error) {
    throw new Error(`resend rejected alert: ${error.message}`);
  }
}

export async function sendAdminAlertWithTimeout(
  subject: string,
  html: string,
  send: (subject: string, html: string) => Promise<void> = sendAdminAlert
): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ADMIN_ALERT_TIMEOUT_MS);
  });

  try {
    await Promise.race([send(subject, html), timeoutPromise]);
  } catch (error) {
    console.warn("[alerts] failed to send admin alert", {
      subject,
      error: error instanceof Error ? error.message : "unknown"
    });
  } finally {
    clearTimeout(timer);
  }
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&#39;");
}
