import { Effect, Layer } from "effect";
import { Mailer, type IMailer } from "./types.js";

export const logMailer: IMailer = {
  send: (subject, body) => Effect.log(`${subject}\n\n${body}`),
};

export const LogMailerLayer = Layer.succeed(Mailer, logMailer);
