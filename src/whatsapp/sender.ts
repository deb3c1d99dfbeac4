import { z } from 'zod'
import { WhatsAppApiError } from '../errors.js'
import type { Logger } from '../logger.js'

export const GRAPH_API_BASE = 'https://graph.facebook.com'

export const TEXT_MAX_LENGTH = 4096
export const BODY_MAX_LENGTH = 1024
export const LIST_HEADER_MAX_LENGTH = 60
export const LIST_ROW_TITLE_MAX_LENGTH = 24
export const BUTTON_TITLE_MAX_LENGTH = 20
export const LIST_MAX_ROWS = 10
export const MAX_BUTTONS = 3

export interface WhatsAppConfig {
  token: string
  phoneNumberId: string
  apiVersion: string
}

export interface SendMessageResponse {
  messageId: string
}

export interface MessageOption {
  id: string
  title: string
}

export interface SendListParams {
  to: string
  body: string
  title: string
  options: MessageOption[]
}

export interface SendButtonsParams {
  to: string
  body: string
  options: MessageOption[]
}

export interface WhatsAppSender {
  sendText(to: string, body: string): Promise<SendMessageResponse>
  sendList(params: SendListParams): Promise<SendMessageResponse>
  sendButtons(params: SendButtonsParams): Promise<SendMessageResponse>
}

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() })).min(1)
})

export function createWhatsAppSender(
  config: WhatsAppConfig,
  logger: Logger,
  fetchFunction: typeof fetch = fetch
): WhatsAppSender {
  const url = `${GRAPH_API_BASE}/${config.apiVersion}/${config.phoneNumberId}/messages`

  async function post(to: string, payload: Record<string, unknown>): Promise<SendMessageResponse> {
    let response: Response
    try {
      response = await fetchFunction(url, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${config.token}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ messaging_product: 'whatsapp', to, ...payload })
      })
    } catch (err) {
      logger.error({ event: 'whatsapp_network_error', to, error: err })
      throw new WhatsAppApiError('Network error sending message', undefined, { cause: err })
    }

    if (!response.ok) {
      const body = await response.text()
      logger.error({ event: 'whatsapp_api_error', to, statusCode: response.status, body })
      if (response.status === 401) {
        logger.error({ event: 'whatsapp_auth_failed', hint: 'Check WHATSAPP_TOKEN and WHATSAPP_PHONE_ID' })
      }
      throw new WhatsAppApiError(`WhatsApp API error: ${response.status}`, response.status)
    }

    const parsed = sendResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      logger.error({ event: 'whatsapp_unexpected_response', to, error: parsed.error.message })
      throw new WhatsAppApiError('Unexpected WhatsApp API response', response.status)
    }

    return { messageId: parsed.data.messages[0].id }
  }

  async function sendText(to: string, body: string): Promise<SendMessageResponse> {
    if (body.length === 0 || body.length > TEXT_MAX_LENGTH) {
      logger.error({ event: 'whatsapp_text_invalid', to, length: body.length })
      throw new WhatsAppApiError('Message is empty or too long')
    }

    logger.info({ event: 'whatsapp_send_start', to })
    const data = await post(to, { type: 'text', text: { body } })
    logger.info({ event: 'whatsapp_send_success', to, messageId: data.messageId })

    return data
  }

  async function sendList(params: SendListParams): Promise<SendMessageResponse> {
    if (params.options.length === 0 || params.options.length > LIST_MAX_ROWS) {
      logger.error({ event: 'whatsapp_list_invalid', to: params.to, optionCount: params.options.length })
      throw new WhatsAppApiError(`A list needs between 1 and ${LIST_MAX_ROWS} options`)
    }

    logger.info({ event: 'whatsapp_send_list_start', to: params.to, optionCount: params.options.length })

    const data = await post(params.to, {
      type: 'interactive',
      interactive: {
        type: 'list',
        header: { type: 'text', text: params.title.slice(0, LIST_HEADER_MAX_LENGTH) },
        body: { text: params.body.slice(0, BODY_MAX_LENGTH) },
        action: {
          button: 'Options',
          sections: [{
            title: 'Choose one',
            rows: params.options.map(option => ({
              id: option.id,
              title: option.title.slice(0, LIST_ROW_TITLE_MAX_LENGTH)
            }))
          }]
        }
      }
    })
    logger.info({ event: 'whatsapp_send_list_success', to: params.to, messageId: data.messageId })

    return data
  }

  async function sendButtons(params: SendButtonsParams): Promise<SendMessageResponse> {
    if (params.options.length === 0 || params.options.length > MAX_BUTTONS) {
      logger.error({ event: 'whatsapp_buttons_invalid', to: params.to, optionCount: params.options.length })
      throw new WhatsAppApiError(`Buttons need between 1 and ${MAX_BUTTONS} options`)
    }

    logger.info({ event: 'whatsapp_send_buttons_start', to: params.to, buttonCount: params.options.length })

    const data = await post(params.to, {
      type: 'interactive',
      interactive: {
        type: 'button',
        body: { text: params.body.slice(0, BODY_MAX_LENGTH) },
        action: {
          buttons: params.options.map(option => ({
            type: 'reply',
            reply: { id: option.id, title: option.title.slice(0, BUTTON_TITLE_MAX_LENGTH) }
          }))
        }
      }
    })
    logger.info({ event: 'whatsapp_send_buttons_success', to: params.to, messageId: data.messageId })

    return data
  }

  return { sendText, sendList, sendButtons }
}

export function createMockSender(logger: Logger): WhatsAppSender {
  let messageCounter = 0

  async function sendText(to: string, body: string): Promise<SendMessageResponse> {
    messageCounter++
    const messageId = `mock-msg-${messageCounter}`

    logger.info({ event: 'mock_send', to, body, messageId })

    return { messageId }
  }

  async function sendList(params: SendListParams): Promise<SendMessageResponse> {
    messageCounter++
    const messageId = `mock-list-${messageCounter}`

    logger.info({
      event: 'mock_send_list',
      to: params.to,
      title: params.title,
      body: params.body,
      options: params.options.map(o => o.title),
      messageId
    })

    return { messageId }
  }

  async function sendButtons(params: SendButtonsParams): Promise<SendMessageResponse> {
    messageCounter++
    const messageId = `mock-buttons-${messageCounter}`

    logger.info({
      event: 'mock_send_buttons',
      to: params.to,
      body: params.body,
      options: params.options.map(o => o.title),
      messageId
    })

    return { messageId }
  }

  return { sendText, sendList, sendButtons }
}
