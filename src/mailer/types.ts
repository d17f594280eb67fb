import { Context, Data, Effect } from "effect";

export class MailSendError extends Data.TaggedError("MailSendError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class Mailer extends Context.Tag("Mailer")<
  Mailer,
  {
    readonly send: (subject: string, body: string) => Effect.Effect<void, MailSendError>;
  }
>() {}

export type IMailer = Context.Tag.Service<typeof Mailer>;
