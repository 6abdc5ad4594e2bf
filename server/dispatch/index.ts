export {
  DispatchEngine,
  DispatchStateError,
  DEFAULT_SUBJECT,
  DEFAULT_BODY,
  messageTokens,
} from './dispatch-engine.js';
export type {
  DispatchEngineOptions,
  DispatchResult,
  DispatchRunOptions,
  DispatchState,
  MessageTemplates,
} from './dispatch-engine.js';
export { buildEmailMap, reconcileEmails } from './reconciler.js';
export type { EmailMap, MappingColumns, ReconcileResult, ReconciliationAmbiguity } from './reconciler.js';
export { ResendTransport, formatSender } from './transport.js';
export type { MailAttachment, MailTransport, OutgoingMail, SendResult } from './transport.js';
