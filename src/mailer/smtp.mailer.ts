import { Effect, Layer, Redacted } from "effect";
import nodemailer, { type Transporter } from "nodemailer";
import { AppConfig } from "../config.js";
import { MailSendError, Mailer, type IMailer } from "./types.js";

export type SmtpConfig = {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: Redacted.Redacted;
};

export type MessageConfig = {
  readonly fromName: string;
  readonly fromAddress: string;
  readonly to: ReadonlyArray<string>;
  readonly cc: ReadonlyArray<string>;
  readonly bcc: ReadonlyArray<string>;
};

export const createSmtpTransport = (config: SmtpConfig): Transporter =>
  nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465, // implicit TLS; otherwise STARTTLS is required
    requireTLS: config.port !== 465,
    auth: {
      user: config.user,
      pass: Redacted.value(config.password),
    },
  });

export const makeSmtpMailer = (message: MessageConfig, transport: Transporter): IMailer => ({
  send: (subject, body) => Effect.tryPromise({
    try: () => transport.sendMail({
      from: { name: message.fromName, address: message.fromAddress },
      to: [...message.to],
      cc: [...message.cc],
      bcc: [...message.bcc],
      subject,
      text: body,
    }),
    catch: (cause) => new MailSendError({
      message: `Mail relay did not accept the message: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    }),
  }).pipe(
    Effect.tap((info) => Effect.logDebug("Mail accepted by relay", { messageId: String(info.messageId) })),
    Effect.asVoid,
    Effect.withSpan("mail-send"),
  ),
});

export const SmtpMailerLayer = Layer.effect(
  Mailer,
  Effect.gen(function* () {
    const smtp = AppConfig.smtp;
    const mail = AppConfig.mail;

    const transport = createSmtpTransport({
      host: yield* smtp.host,
      port: yield* smtp.port,
      user: yield* smtp.user,
      password: yield* smtp.password,
    });

    return makeSmtpMailer(
      {
        fromName: yield* mail.fromName,
        fromAddress: yield* mail.fromAddress,
        to: yield* mail.to,
        cc: yield* mail.cc,
        bcc: yield* mail.bcc,
      },
      transport,
    );
  }),
);
