import { z } from 'zod'

/** ICAO location indicators are four characters; a few sources also take three-letter codes */
export const IDENTIFIER_PATTERN = /^[A-Z0-9]{3,4}$/

export const identifierSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(IDENTIFIER_PATTERN, 'Expected a 3-4 character airport identifier such as KJFK')
