import { z } from "zod";

import type { ChannelPayloadMap, NotificationChannel } from "@/jobs/notificationJob";

export const EVENT_TYPES = ["user_registered", "email_verified", "article_published"] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((eventType) => eventType === value);
}

export type ChannelMessages = { [C in NotificationChannel]?: ChannelPayloadMap[C] };

export interface TemplateHelpers {
  verificationUrl(userId: string): string;
}

type RenderEvent = (recipient: string, context: unknown, helpers: TemplateHelpers) => ChannelMessages;

function defineTemplate<S extends z.ZodTypeAny>(
  schema: S,
  render: (recipient: string, context: z.infer<S>, helpers: TemplateHelpers) => ChannelMessages,
): RenderEvent {
  return (recipient, context, helpers) => render(recipient, schema.parse(context ?? {}), helpers);
}

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

const userRegisteredContext = z.object({
  email: z.string().email(),
  name: z.string().trim().min(1).optional(),
});

const emailVerifiedContext = z.object({
  email: z.string().email().optional(),
});

const articlePublishedContext = z.object({
  articleId: z.union([z.string().min(1), z.number().int()]).transform(String),
  title: z.string().trim().min(1),
  url: z.string().url().optional(),
});

export const templates: Record<EventType, RenderEvent> = {
  user_registered: defineTemplate(userRegisteredContext, (recipient, context, helpers) => {
    const greeting = context.name ?? context.email;
    const url = helpers.verificationUrl(recipient);

    return {
      email: {
        subject: "Welcome! Please verify your email",
        bodyText: [
          `Hi ${greeting},`,
          "",
          "Thanks for signing up. Please verify your email address by opening the link below:",
          "",
          url,
          "",
          "If you did not create an account, you can ignore this message.",
        ].join("\n"),
        bodyHtml: [
          `<p>Hi <b>${escapeHtml(greeting)}</b>,</p>`,
          "<p>Thanks for signing up. Please verify your email address:</p>",
          `<p><a href="${escapeHtml(url)}">Verify your email</a></p>`,
          "<p>If you did not create an account, you can ignore this message.</p>",
        ].join(""),
      },
      in_app: {
        title: "Welcome!",
        body: `Hi ${greeting}, explore what's new and set up your notification preferences.`,
      },
    };
  }),

  email_verified: defineTemplate(emailVerifiedContext, () => ({
    in_app: {
      title: "Email verified",
      body: "Your email address has been verified. Thanks for confirming!",
    },
  })),

  article_published: defineTemplate(articlePublishedContext, (_recipient, context) => {
    const linkLine = context.url ? `\n\nRead it here: ${context.url}` : "";

    return {
      email: {
        subject: `Your article "${context.title}" is live`,
        bodyText: `Good news: "${context.title}" has been published.${linkLine}`,
        metadata: { articleId: context.articleId },
      },
      in_app: {
        title: "Article published",
        body: `"${context.title}" is now live.`,
        ...(context.url ? { link: context.url } : {}),
        metadata: { articleId: context.articleId },
      },
    };
  }),
};

export function renderEvent(
  eventType: EventType,
  recipient: string,
  context: unknown,
  helpers: TemplateHelpers,
): ChannelMessages {
  return templates[eventType](recipient, context, helpers);
}
