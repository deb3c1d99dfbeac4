import type { OutboundDirective } from '../conversation/types.js'
import type { Logger } from '../logger.js'
import type { WhatsAppSender } from './sender.js'

/**
 * Sends a directive and reports whether it went out. Failures are logged here
 * and never thrown: a committed session is not rolled back for them.
 */
export async function dispatchDirective(
  sender: WhatsAppSender,
  directive: OutboundDirective,
  logger: Logger
): Promise<boolean> {
  try {
    switch (directive.form) {
      case 'noop':
        return true
      case 'text':
        await sender.sendText(directive.recipient, directive.body)
        return true
      case 'list':
        await sender.sendList({
          to: directive.recipient,
          body: directive.body,
          title: directive.title,
          options: directive.options
        })
        return true
      case 'buttons':
        await sender.sendButtons({
          to: directive.recipient,
          body: directive.body,
          options: directive.options
        })
        return true
    }
  } catch (err) {
    logger.error({ event: 'outbound_delivery_failed', recipient: directive.recipient, form: directive.form, error: err })
    return false
  }
}
