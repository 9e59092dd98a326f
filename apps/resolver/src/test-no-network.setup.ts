import https from 'node:https'
import tls from 'node:tls'

// Loopback http stays open for supertest; anything leaving the process does not
const original = {
  https: { request: https.request, get: https.get },
  tls: { connect: tls.connect },
  fetch: globalThis.fetch,
}

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled for chart resolver tests')
}

Object.assign(https, { request: blockedNetwork, get: blockedNetwork })
Object.assign(tls, { connect: blockedNetwork })
globalThis.fetch = async () => blockedNetwork()

process.on('exit', () => {
  Object.assign(https, original.https)
  Object.assign(tls, original.tls)
  globalThis.fetch = original.fetch
})
