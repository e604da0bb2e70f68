import fs from 'fs'
import pino from 'pino'
import { z } from 'zod'
import type { AccountDirectory } from '../core/interfaces.js'
import type { Account } from '../core/types.js'

const accountSchema = z.object({
  id: z.string().min(1),
  channelId: z.string().optional(),
  webhookUrl: z.string().url(),
  webhookSecret: z.string().min(1),
  platformAccessToken: z.string().optional(),
  status: z.enum(['active', 'inactive']).default('active')
})

const accountsFileSchema = z.object({
  accounts: z.array(accountSchema).default([])
})

/**
 * Read-only account lookup over a fixed list. Account CRUD lives elsewhere;
 * this side only needs webhook URL, secret, status and the platform token.
 */
export class StaticAccountDirectory implements AccountDirectory {
  private byId = new Map<string, Account>()
  private byChannel = new Map<string, Account>()

  constructor(accounts: Account[] = []) {
    this.replace(accounts)
  }

  async get(accountId: string): Promise<Account | null> {
    const account = this.byId.get(accountId)
    return account ? { ...account } : null
  }

  async findByChannelId(channelId: string): Promise<Account | null> {
    const account = this.byChannel.get(channelId)
    return account ? { ...account } : null
  }

  list(): Account[] {
    return [...this.byId.values()].map((account) => ({ ...account }))
  }

  replace(accounts: Account[]): void {
    this.byId = new Map(accounts.map((account) => [account.id, { ...account }]))
    this.byChannel = new Map()
    for (const account of accounts) {
      if (account.channelId) this.byChannel.set(account.channelId, { ...account })
    }
  }
}

/**
 * Directory backed by a JSON file (`{ "accounts": [...] }`). `reload()` picks
 * up edits; a file that fails validation leaves the previous accounts in place.
 */
export class FileAccountDirectory extends StaticAccountDirectory {
  private readonly logger = pino({ name: 'account-directory', level: process.env.LOG_LEVEL || 'info' })

  constructor(private readonly file: string) {
    super()
    this.reload()
  }

  reload(): boolean {
    try {
      if (!fs.existsSync(this.file)) {
        this.logger.warn({ file: this.file }, 'Accounts file not found, directory is empty')
        this.replace([])
        return false
      }
      const parsed = accountsFileSchema.parse(JSON.parse(fs.readFileSync(this.file, 'utf8')))
      this.replace(parsed.accounts)
      this.logger.info({ file: this.file, accounts: parsed.accounts.length }, 'Accounts loaded')
      return true
    } catch (err) {
      this.logger.error({ err, file: this.file }, 'Failed to load accounts, keeping previous set')
      return false
    }
  }
}
