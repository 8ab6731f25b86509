export {
  DEFAULT_FREESEND_ENDPOINT,
  DEFAULT_FREESEND_TIMEOUT_MS,
  type FreesendMailerConfig,
  type FreesendPackageConfig,
  type FreesendTransportOptions,
  freesendEnvSchema,
  freesendMailerSchema,
  type LoadFreesendConfigOptions,
  loadFreesendConfig,
  parseFreesendMailerConfig,
  resolveFreesendOptions,
} from "./adapters/freesend/freesend-config"
export { FreesendError, type FreesendErrorCode } from "./adapters/freesend/freesend-error"
export {
  buildFreesendPayload,
  type FreesendAttachment,
  type FreesendContentAttachment,
  type FreesendPayload,
  type FreesendUrlAttachment,
} from "./adapters/freesend/freesend-payload"
export { FreesendTransport, type FreesendTransportDeps } from "./adapters/freesend/freesend-transport"
export {
  type RegisterFreesendOptions,
  registerFreesendTransport,
} from "./adapters/freesend/register-freesend"
export {
  getAttachmentUrl,
  URL_ATTACHMENT_HEADER,
  urlAttachment,
} from "./adapters/freesend/url-attachment"
export { FetchHttpClient, type FetchHttpClientOptions } from "./adapters/http/fetch-http-client"
export { MemoryTransport, type SentEmail } from "./adapters/memory/memory-transport"
export { MessageError, type MessageErrorCode } from "./core/address/message-error"
export { resolveRecipient, resolveSender } from "./core/address/resolve-address"
export { createEnvelope } from "./core/envelope/create-envelope"
export { MailManager, type MailManagerDeps } from "./core/mailer/mail-manager"
export { Mailer } from "./core/mailer/mailer"
export type {
  MailConfig,
  MailerConfig,
  TransportFactory,
  TransportFactoryContext,
} from "./core/mailer/mailer-config"
export { MailerError, type MailerErrorCode } from "./core/mailer/mailer-error"
export type { EmailAddress, EmailRecipient, EmailRecipients } from "./ports/address"
export type { Envelope } from "./ports/envelope"
export type { HttpClient, HttpRequest, HttpResponse } from "./ports/http-client"
export type { Attachment, AttachmentContent, EmailMessage } from "./ports/message"
export type { EmailTransport, SendResult } from "./ports/transport"
