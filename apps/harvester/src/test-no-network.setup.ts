import http from 'node:http'
import https from 'node:https'
import net from 'node:net'
import tls from 'node:tls'
import { vi } from 'vitest'

function blockedNetwork(): never {
  throw new Error('Outbound network is disabled in tests')
}

vi.spyOn(http, 'request').mockImplementation(blockedNetwork)
vi.spyOn(http, 'get').mockImplementation(blockedNetwork)
vi.spyOn(https, 'request').mockImplementation(blockedNetwork)
vi.spyOn(https, 'get').mockImplementation(blockedNetwork)
vi.spyOn(net, 'connect').mockImplementation(blockedNetwork)
vi.spyOn(net, 'createConnection').mockImplementation(blockedNetwork)
vi.spyOn(tls, 'connect').mockImplementation(blockedNetwork)

// Tests that exercise FetchTransport replace this with their own stub
globalThis.fetch = async () => blockedNetwork()
