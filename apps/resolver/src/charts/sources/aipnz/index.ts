import { createOfflineDatabaseAdapter } from '../../adapters/offline-database.js'

/** AIP New Zealand, served from a pre-scraped JSON database. */
export const aipnzAdapter = createOfflineDatabaseAdapter()
