import { describe, it, expect, beforeEach, vi } from 'vitest'
import { TransferSession, connectSFTP } from '../../main/services/TransferSession'
import { LogService } from '../../main/services/LogService'
import { ConnectionError } from '../../main/utils/errors'

type ClientScript = 'ready' | 'auth-failure' | 'sftp-failure'

interface FakeSSH {
  script: ClientScript
  endCalls: number
  sftpEndCalls: number
  /** Emits an 'error' on the most recently created client */
  emitError: (err: Error) => void
}

const ssh = vi.hoisted(
  (): FakeSSH => ({
    script: 'ready',
    endCalls: 0,
    sftpEndCalls: 0,
    emitError: () => undefined
  })
)

vi.mock('ssh2', async () => {
  const { EventEmitter } = await import('events')

  class Client extends EventEmitter {
    constructor() {
      super()
      ssh.emitError = (err) => this.emit('error', err)
    }

    connect(): this {
      setImmediate(() => {
        if (ssh.script === 'auth-failure') {
          this.emit(
            'error',
            Object.assign(new Error('All configured authentication methods failed'), {
              level: 'client-authentication'
            })
          )
        } else {
          this.emit('ready')
        }
      })
      return this
    }

    sftp(callback: (err: Error | undefined, sftp: { end(): void } | undefined) => void): void {
      if (ssh.script === 'sftp-failure') {
        callback(new Error('Unable to start subsystem: sftp'), undefined)
        return
      }
      callback(undefined, { end: () => ssh.sftpEndCalls++ })
    }

    end(): this {
      ssh.endCalls++
      return this
    }
  }

  return { default: { Client } }
})

beforeEach(() => {
  ssh.script = 'ready'
  ssh.endCalls = 0
  ssh.sftpEndCalls = 0
})

describe('connectSFTP', () => {
  it('ends the transport when authentication fails', async () => {
    ssh.script = 'auth-failure'

    await expect(connectSFTP({ host: 'sftp.example.test' })).rejects.toMatchObject({
      level: 'client-authentication'
    })
    expect(ssh.endCalls).toBe(1)
  })

  it('ends the transport when the SFTP subsystem cannot be opened', async () => {
    ssh.script = 'sftp-failure'

    await expect(connectSFTP({ host: 'sftp.example.test' })).rejects.toThrow('Unable to start subsystem: sftp')
    expect(ssh.endCalls).toBe(1)
  })

  it('keeps a transport error raised after the channel opened', async () => {
    const connection = await connectSFTP({ host: 'sftp.example.test' })
    expect(connection.lastError).toBeUndefined()

    const dropped = new Error('read ECONNRESET')
    ssh.emitError(dropped)

    expect(connection.lastError).toBe(dropped)
    expect(ssh.endCalls).toBe(0)
    connection.end()
    expect(ssh.endCalls).toBe(1)
  })
})

describe('TransferSession.open over ssh2', () => {
  it('reports an authentication failure as ConnectionError(auth)', async () => {
    ssh.script = 'auth-failure'

    const opening = TransferSession.open(
      { host: 'sftp.example.test', username: 'alice', credential: 'test-secret' },
      { log: new LogService() }
    )

    await expect(opening).rejects.toBeInstanceOf(ConnectionError)
    await expect(opening).rejects.toMatchObject({ reason: 'auth' })
    expect(ssh.endCalls).toBe(1)
  })

  it('closes both the channel and the transport', async () => {
    const session = await TransferSession.open(
      { host: 'sftp.example.test', username: 'alice', credential: 'test-secret' },
      { log: new LogService() }
    )

    session.close()

    expect(ssh.sftpEndCalls).toBe(1)
    expect(ssh.endCalls).toBe(1)
  })
})
