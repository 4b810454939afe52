import type { RenderedEmail, TemplateContext } from "../types/email";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function buildLink(baseUrl: string, path: string, token: string): string {
  return `${baseUrl}/${path}?token=${encodeURIComponent(token)}`;
}

/** "24 hours", "1 hour", "15 minutes". */
export function describeLifetime(seconds: number): string {
  if (seconds % 3600 === 0) {
    const hours = seconds / 3600;
    return `${hours} ${hours === 1 ? "hour" : "hours"}`;
  }
  const minutes = Math.ceil(seconds / 60);
  return `${minutes} ${minutes === 1 ? "minute" : "minutes"}`;
}

function layout(appName: string, heading: string, body: string): string {
  const app = escapeHtml(appName);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(heading)}</title>
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f5f5f5; color: #333; line-height: 1.6;">
  <div style="max-width: 560px; margin: 40px auto; background: #fff; border-radius: 8px; overflow: hidden;">
    <div style="background: #4f46e5; color: #fff; padding: 30px; text-align: center;">
      <h1 style="font-size: 24px; font-weight: 500;">${app}</h1>
    </div>
    <div style="padding: 35px 30px;">
      <h2 style="font-size: 20px; margin-bottom: 15px;">${escapeHtml(heading)}</h2>
      ${body}
    </div>
    <div style="background: #f8f9fa; padding: 20px 30px; text-align: center; font-size: 13px; color: #999;">
      <p>This is an automated message from ${app}, please do not reply.</p>
    </div>
  </div>
</body>
</html>`;
}

function button(link: string, label: string): string {
  const href = escapeHtml(link);
  return `<p style="margin: 30px 0; text-align: center;"><a href="${href}" style="background: #4f46e5; color: #fff; padding: 12px 24px; border-radius: 6px; text-decoration: none;">${label}</a></p>
      <p style="font-size: 13px; color: #666;">Or paste this link into your browser: ${href}</p>`;
}

function textFooter(appName: string): string {
  return `---\n${appName}\nThis is an automated message, please do not reply.`;
}

function requireLink(context: TemplateContext): string {
  if (!context.link) {
    throw new Error("This email template needs a link");
  }
  return context.link;
}

export function verificationEmail(context: TemplateContext): RenderedEmail {
  const link = requireLink(context);
  const name = escapeHtml(context.name);
  const expiry = context.expiresIn ? ` This link expires in ${context.expiresIn}.` : "";
  return {
    subject: `Verify your email for ${context.appName}`,
    html: layout(
      context.appName,
      "Verify your email",
      `<p>Hi ${name},</p>
      <p>Thanks for signing up. Confirm your email address to activate your account.${expiry}</p>
      ${button(link, "Verify email")}
      <p>If you didn't create an account, you can ignore this email.</p>`
    ),
    text: `Hi ${context.name},\n\nConfirm your email address to activate your account:\n${link}\n${expiry.trim()}\n\nIf you didn't create an account, you can ignore this email.\n\n${textFooter(context.appName)}`,
  };
}

export function passwordResetEmail(context: TemplateContext): RenderedEmail {
  const link = requireLink(context);
  const name = escapeHtml(context.name);
  const expiry = context.expiresIn ? ` This link expires in ${context.expiresIn}.` : "";
  return {
    subject: `Reset your ${context.appName} password`,
    html: layout(
      context.appName,
      "Reset your password",
      `<p>Hi ${name},</p>
      <p>We received a request to reset your password.${expiry}</p>
      ${button(link, "Reset password")}
      <p>If you didn't ask for this, your password stays unchanged.</p>`
    ),
    text: `Hi ${context.name},\n\nReset your password here:\n${link}\n${expiry.trim()}\n\nIf you didn't ask for this, your password stays unchanged.\n\n${textFooter(context.appName)}`,
  };
}

export function welcomeEmail(context: TemplateContext): RenderedEmail {
  const name = escapeHtml(context.name);
  return {
    subject: `Welcome to ${context.appName}`,
    html: layout(
      context.appName,
      "Welcome aboard",
      `<p>Hi ${name},</p>
      <p>Your email is verified and your account is ready to use.</p>`
    ),
    text: `Hi ${context.name},\n\nYour email is verified and your account is ready to use.\n\n${textFooter(context.appName)}`,
  };
}

export function passwordChangedEmail(context: TemplateContext): RenderedEmail {
  const name = escapeHtml(context.name);
  return {
    subject: `Your ${context.appName} password was changed`,
    html: layout(
      context.appName,
      "Password changed",
      `<p>Hi ${name},</p>
      <p>The password for your account was just changed. If this wasn't you, reset your password right away.</p>`
    ),
    text: `Hi ${context.name},\n\nThe password for your account was just changed. If this wasn't you, reset your password right away.\n\n${textFooter(context.appName)}`,
  };
}
