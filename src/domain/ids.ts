import { randomUUID } from 'node:crypto'

export const NIL_ID = '00000000-0000-0000-0000-000000000000'

export const newId = (): string => randomUUID()

export const isNilId = (id: string): boolean => id === NIL_ID

export const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)
