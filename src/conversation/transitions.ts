import { getMessage, type Messages } from '../messages.js'
import { answerToken } from './normalizer.js'
import { buttonsDirective, listDirective, textDirective } from './directives.js'
import { formatListingSummary } from './summary.js'
import { HOUSE_TYPES, type HouseType, type Input, type ListingAttributes, type OutboundDirective, type RoomTier, type Session, type Step } from './types.js'

export interface SessionMutation {
  verified?: boolean
  imageReceived?: boolean
  attributes?: ListingAttributes
  reset?: boolean
}

export interface Transition {
  next: Step
  accepted: boolean
  directive: OutboundDirective
  mutation?: SessionMutation
  listingConfirmed?: boolean
}

export interface TransitionContext {
  messages: Messages
}

type StepHandler = (input: Input, session: Session, context: TransitionContext) => Transition

const ROLE_OPTIONS = ['Student', 'Landlord'] as const
const HOUSE_TYPE_OPTIONS = ['Boys', 'Girls', 'Mixed'] as const
const YES_NO_OPTIONS = ['Yes', 'No'] as const
const CONFIRM_OPTIONS = ['Confirm', 'Cancel'] as const

interface TierDefinition {
  label: string
  countStep: Step
  rentStep: Step
  nextStep: Step
  count(value: number): ListingAttributes
  rent(value: number): ListingAttributes
}

const TIERS: Record<RoomTier, TierDefinition> = {
  single: {
    label: 'single',
    countStep: 'single_count',
    rentStep: 'single_rent',
    nextStep: 'two_share_count',
    count: (value) => ({ roomSingleCount: value }),
    rent: (value) => ({ rentSingle: value })
  },
  two_share: {
    label: 'two-share',
    countStep: 'two_share_count',
    rentStep: 'two_share_rent',
    nextStep: 'three_share_count',
    count: (value) => ({ room2Count: value }),
    rent: (value) => ({ rent2: value })
  },
  three_share: {
    label: 'three-share',
    countStep: 'three_share_count',
    rentStep: 'three_share_rent',
    nextStep: 'asking_age',
    count: (value) => ({ room3Count: value }),
    rent: (value) => ({ rent3: value })
  }
}

function isHouseType(value: string): value is HouseType {
  return HOUSE_TYPES.some(type => type === value)
}

function roomPrompt(key: 'room_count_prompt' | 'room_rent_prompt', tier: RoomTier, messages: Messages): string {
  return getMessage(messages, key, { tier: TIERS[tier].label })
}

function joinMessages(...parts: string[]): string {
  return parts.join('\n\n')
}

/**
 * Returns a new session; `reset` starts a fresh lifecycle that keeps only the
 * party's identity.
 */
export function applyMutation(session: Session, next: Step, mutation: SessionMutation | undefined, now: number): Session {
  if (mutation?.reset) {
    return {
      partyId: session.partyId,
      step: next,
      displayName: session.displayName,
      verified: false,
      imageReceived: false,
      attributes: {},
      createdAt: now,
      updatedAt: now
    }
  }

  return {
    ...session,
    step: next,
    verified: mutation?.verified ?? session.verified,
    imageReceived: mutation?.imageReceived ?? session.imageReceived,
    attributes: { ...session.attributes, ...mutation?.attributes },
    updatedAt: now
  }
}

/**
 * The message a step sends when it is entered, and again whenever it has to
 * ask for the same answer.
 */
export function promptFor(step: Step, session: Session, context: TransitionContext): OutboundDirective {
  const { messages } = context
  const recipient = session.partyId

  switch (step) {
    case 'start':
      return listDirective(
        recipient,
        getMessage(messages, 'role_prompt', { name: session.displayName ?? 'there' }),
        getMessage(messages, 'role_title'),
        ROLE_OPTIONS
      )
    case 'awaiting_image':
      return textDirective(recipient, getMessage(messages, 'image_prompt'))
    case 'collecting_house_type':
      return listDirective(
        recipient,
        getMessage(messages, 'house_type_prompt'),
        getMessage(messages, 'house_type_title'),
        HOUSE_TYPE_OPTIONS
      )
    case 'asking_cat':
      return buttonsDirective(recipient, getMessage(messages, 'cat_prompt'), YES_NO_OPTIONS)
    case 'asking_availability':
      return buttonsDirective(recipient, getMessage(messages, 'availability_prompt'), YES_NO_OPTIONS)
    case 'single_count':
      return textDirective(recipient, roomPrompt('room_count_prompt', 'single', messages))
    case 'single_rent':
      return textDirective(recipient, roomPrompt('room_rent_prompt', 'single', messages))
    case 'two_share_count':
      return textDirective(recipient, roomPrompt('room_count_prompt', 'two_share', messages))
    case 'two_share_rent':
      return textDirective(recipient, roomPrompt('room_rent_prompt', 'two_share', messages))
    case 'three_share_count':
      return textDirective(recipient, roomPrompt('room_count_prompt', 'three_share', messages))
    case 'three_share_rent':
      return textDirective(recipient, roomPrompt('room_rent_prompt', 'three_share', messages))
    case 'asking_age':
      return textDirective(recipient, getMessage(messages, 'age_prompt'))
    case 'confirming_listing':
      return buttonsDirective(
        recipient,
        getMessage(messages, 'confirm_prompt', { summary: formatListingSummary(session.attributes) }),
        CONFIRM_OPTIONS
      )
    case 'student_pending':
      return textDirective(recipient, getMessage(messages, 'student_welcome'))
    case 'end':
      return textDirective(recipient, getMessage(messages, 'closing'))
  }
}

function stay(step: Step, directive: OutboundDirective): Transition {
  return { next: step, accepted: false, directive }
}

function reprompt(step: Step, session: Session, context: TransitionContext): Transition {
  return stay(step, promptFor(step, session, context))
}

function advance(next: Step, session: Session, context: TransitionContext, mutation?: SessionMutation): Transition {
  const entered = applyMutation(session, next, mutation, session.updatedAt)
  return { next, accepted: true, directive: promptFor(next, entered, context), mutation }
}

const handleStart: StepHandler = (input, session, context) => {
  if (input.kind === 'greeting') {
    return { next: 'start', accepted: true, directive: promptFor('start', session, context) }
  }

  const token = answerToken(input)
  if (token === 'landlord') {
    return advance('awaiting_image', session, context, { verified: false, imageReceived: false })
  }
  if (token === 'student') {
    return advance('student_pending', session, context)
  }

  const { messages } = context
  return stay('start', listDirective(
    session.partyId,
    getMessage(messages, 'role_reprompt'),
    getMessage(messages, 'role_title'),
    ROLE_OPTIONS
  ))
}

const handleAwaitingImage: StepHandler = (input, session, context) => {
  if (input.kind === 'image' && !session.imageReceived) {
    return advance('collecting_house_type', session, context, { imageReceived: true, verified: true })
  }
  return stay('awaiting_image', textDirective(session.partyId, getMessage(context.messages, 'image_reprompt')))
}

const handleHouseType: StepHandler = (input, session, context) => {
  const token = answerToken(input)
  if (token !== undefined && isHouseType(token)) {
    return advance('asking_cat', session, context, { attributes: { houseType: token } })
  }

  const { messages } = context
  return stay('collecting_house_type', listDirective(
    session.partyId,
    getMessage(messages, 'house_type_reprompt'),
    getMessage(messages, 'house_type_title'),
    HOUSE_TYPE_OPTIONS
  ))
}

const handleCat: StepHandler = (input, session, context) => {
  const token = answerToken(input)
  if (token === 'yes' || token === 'no') {
    return advance('asking_availability', session, context, { attributes: { hasCat: token === 'yes' } })
  }
  return reprompt('asking_cat', session, context)
}

const handleAvailability: StepHandler = (input, session, context) => {
  const token = answerToken(input)
  if (token === 'no') {
    return {
      next: 'end',
      accepted: true,
      directive: textDirective(session.partyId, getMessage(context.messages, 'no_vacancies'))
    }
  }
  if (token === 'yes') {
    return advance('single_count', session, context)
  }
  return reprompt('asking_availability', session, context)
}

function roomCountHandler(tier: RoomTier): StepHandler {
  const definition = TIERS[tier]
  return (input, session, context) => {
    const count = input.kind === 'number' ? Number.parseInt(input.normalized, 10) : Number.NaN
    if (!Number.isSafeInteger(count)) {
      return stay(definition.countStep, textDirective(
        session.partyId,
        joinMessages(
          getMessage(context.messages, 'room_count_invalid'),
          roomPrompt('room_count_prompt', tier, context.messages)
        )
      ))
    }
    return advance(definition.rentStep, session, context, { attributes: definition.count(count) })
  }
}

function roomRentHandler(tier: RoomTier): StepHandler {
  const definition = TIERS[tier]
  return (input, session, context) => {
    const numeric = input.kind === 'number' || input.kind === 'decimal'
    const rent = numeric ? Number.parseFloat(input.normalized) : Number.NaN
    if (!Number.isFinite(rent)) {
      return stay(definition.rentStep, textDirective(
        session.partyId,
        joinMessages(
          getMessage(context.messages, 'room_rent_invalid'),
          roomPrompt('room_rent_prompt', tier, context.messages)
        )
      ))
    }
    return advance(definition.nextStep, session, context, { attributes: definition.rent(rent) })
  }
}

const handleAge: StepHandler = (input, session, context) => {
  if (input.kind === 'free_text' || input.kind === 'number' || input.kind === 'decimal') {
    return advance('confirming_listing', session, context, { attributes: { studentAge: input.normalized } })
  }
  return reprompt('asking_age', session, context)
}

const handleConfirmation: StepHandler = (input, session, context) => {
  const token = answerToken(input)
  if (token === 'confirm') {
    return {
      next: 'end',
      accepted: true,
      directive: textDirective(session.partyId, getMessage(context.messages, 'listing_confirmed')),
      listingConfirmed: true
    }
  }
  if (token === 'cancel') {
    return {
      next: 'end',
      accepted: true,
      directive: textDirective(session.partyId, getMessage(context.messages, 'listing_cancelled'))
    }
  }
  return reprompt('confirming_listing', session, context)
}

const handleStudentPending: StepHandler = (_input, session, context) => reprompt('student_pending', session, context)

const handleEnd: StepHandler = (input, session, context) => {
  if (input.kind === 'greeting') {
    return {
      next: 'start',
      accepted: true,
      directive: promptFor('start', session, context),
      mutation: { reset: true }
    }
  }
  return reprompt('end', session, context)
}

export const transitionTable: Record<Step, StepHandler> = {
  start: handleStart,
  awaiting_image: handleAwaitingImage,
  collecting_house_type: handleHouseType,
  asking_cat: handleCat,
  asking_availability: handleAvailability,
  single_count: roomCountHandler('single'),
  single_rent: roomRentHandler('single'),
  two_share_count: roomCountHandler('two_share'),
  two_share_rent: roomRentHandler('two_share'),
  three_share_count: roomCountHandler('three_share'),
  three_share_rent: roomRentHandler('three_share'),
  asking_age: handleAge,
  confirming_listing: handleConfirmation,
  student_pending: handleStudentPending,
  end: handleEnd
}

export function transition(session: Session, input: Input, context: TransitionContext): Transition {
  if (input.kind === 'unrecognized') {
    return reprompt(session.step, session, context)
  }
  return transitionTable[session.step](input, session, context)
}
