import { createJsonApiAdapter } from '../../adapters/json-api.js'
import { aviationApiCharts, aviationApiResponseSchema } from './extract.js'

export const aviationApiAdapter = createJsonApiAdapter({
  requestUrl: ({ identifier, baseEndpoint }) =>
    `${baseEndpoint}charts?apt=${encodeURIComponent(identifier)}`,
  schema: aviationApiResponseSchema,
  toRawCharts: aviationApiCharts,
})
