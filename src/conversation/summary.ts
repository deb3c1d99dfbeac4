import type { ListingAttributes } from './types.js'

function formatAmount(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2)
}

function roomLine(label: string, count: number | undefined, rent: number | undefined): string | undefined {
  if (count === undefined) return undefined
  if (rent === undefined) return `${label}: ${count}`
  return `${label}: ${count} at ${formatAmount(rent)} each`
}

export function formatListingSummary(attributes: ListingAttributes): string {
  const lines: Array<string | undefined> = [
    attributes.houseType !== undefined ? `House type: ${attributes.houseType}` : undefined,
    attributes.hasCat !== undefined ? `Cat on premises: ${attributes.hasCat ? 'yes' : 'no'}` : undefined,
    roomLine('Single rooms', attributes.roomSingleCount, attributes.rentSingle),
    roomLine('Two-share rooms', attributes.room2Count, attributes.rent2),
    roomLine('Three-share rooms', attributes.room3Count, attributes.rent3),
    attributes.studentAge !== undefined ? `Preferred student age: ${attributes.studentAge}` : undefined
  ]
  return lines.filter((line): line is string => line !== undefined).join('\n')
}
