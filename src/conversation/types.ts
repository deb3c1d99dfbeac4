export const ROOM_TIERS = ['single', 'two_share', 'three_share'] as const

export type RoomTier = typeof ROOM_TIERS[number]

export const STEPS = [
  'start',
  'awaiting_image',
  'collecting_house_type',
  'asking_cat',
  'asking_availability',
  'single_count',
  'single_rent',
  'two_share_count',
  'two_share_rent',
  'three_share_count',
  'three_share_rent',
  'asking_age',
  'confirming_listing',
  'student_pending',
  'end'
] as const

export type Step = typeof STEPS[number]

export const HOUSE_TYPES = ['boys', 'girls', 'mixed'] as const

export type HouseType = typeof HOUSE_TYPES[number]

export interface ListingAttributes {
  houseType?: HouseType
  hasCat?: boolean
  roomSingleCount?: number
  rentSingle?: number
  room2Count?: number
  rent2?: number
  room3Count?: number
  rent3?: number
  studentAge?: string
}

export interface Session {
  partyId: string
  step: Step
  displayName?: string
  verified: boolean
  imageReceived: boolean
  attributes: ListingAttributes
  createdAt: number
  updatedAt: number
}

/**
 * A session as read back from storage. The step is only a string until it has
 * been checked against the current step graph.
 */
export interface StoredSession extends Omit<Session, 'step'> {
  step: string
}

export interface DedupRecord {
  recentEventIds: string[]
}

/**
 * Provider-neutral view of one inbound delivery. `kind` is the provider's
 * message type verbatim; only `text`, `image` and `interactive` are understood.
 */
export interface InboundEvent {
  partyId: string
  deliveryId: string
  kind: string
  displayName?: string
  text?: string
  selectionId?: string
}

export type InputKind =
  | 'greeting'
  | 'role_choice'
  | 'yes_no'
  | 'free_text'
  | 'number'
  | 'decimal'
  | 'image'
  | 'selection_id'
  | 'unrecognized'

export interface Input {
  kind: InputKind
  raw: string
  normalized: string
}

export interface DirectiveOption {
  id: string
  title: string
}

export interface TextDirective {
  form: 'text'
  recipient: string
  body: string
}

export interface ListDirective {
  form: 'list'
  recipient: string
  body: string
  title: string
  options: DirectiveOption[]
}

export interface ButtonsDirective {
  form: 'buttons'
  recipient: string
  body: string
  options: DirectiveOption[]
}

export interface NoopDirective {
  form: 'noop'
  recipient: string
}

export type OutboundDirective = TextDirective | ListDirective | ButtonsDirective | NoopDirective

export interface ListingSummary {
  partyId: string
  displayName?: string
  attributes: ListingAttributes
}

export interface EngineResult {
  directive: OutboundDirective
  duplicate: boolean
  step?: Step
  confirmedListing?: ListingSummary
}

export interface SessionStore {
  load(partyId: string): Promise<StoredSession | undefined>
  save(partyId: string, session: Session): Promise<void>
}

export interface DedupStore {
  load(partyId: string): Promise<DedupRecord | undefined>
  save(partyId: string, record: DedupRecord): Promise<void>
}
