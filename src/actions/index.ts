export type { ActionContext } from './types.js'
export { runInvitation } from './invitation.js'
export type { InvitationSummary } from './invitation.js'
export { runReminder, REMINDER_MESSAGE_THRESHOLD } from './reminder.js'
export type { ReminderSummary } from './reminder.js'
export { trySend } from './delivery.js'
