import inquirer from 'inquirer'

import type { Decision, RunContext } from '../types.js'

export const REVERSE_CONFIRMATION_PHRASE = 'REVERSE'

/**
 * Blocking human confirmation. There is no timeout; declining is the only
 * way out.
 */
export interface ApprovalGate {
  confirm(title: string, description: string): Promise<Decision>
  /**
   * Approved only when the user types `phrase` exactly.
   */
  confirmPhrase(message: string, phrase: string): Promise<Decision>
}

/**
 * The two questions the gate asks.
 */
export interface PromptIO {
  yesNo(message: string): Promise<boolean>
  text(message: string): Promise<string>
}

export const inquirerPrompts: PromptIO = {
  async yesNo(message) {
    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
      {
        type: 'confirm',
        name: 'proceed',
        message,
        default: false,
      },
    ])
    return proceed
  },
  async text(message) {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message,
      },
    ])
    return answer
  },
}

export class InteractiveGate implements ApprovalGate {
  constructor(private readonly ctx: RunContext, private readonly prompts: PromptIO = inquirerPrompts) {}

  async confirm(title: string, description: string): Promise<Decision> {
    const { logger } = this.ctx
    logger.info(`APPROVAL REQUIRED: ${title}`)
    logger.info(`  ${description}`)

    if (this.ctx.dryRun) {
      logger.info(`[DRY-RUN] Would proceed with: ${title}`)
      return 'approved'
    }

    if (await this.prompts.yesNo(`Proceed with ${title}?`)) {
      logger.success(`Approved: ${title}`)
      return 'approved'
    }
    logger.warn(`Declined: ${title}`)
    return 'declined'
  }

  async confirmPhrase(message: string, phrase: string): Promise<Decision> {
    const { logger } = this.ctx
    if (this.ctx.dryRun) {
      logger.info(`[DRY-RUN] Would ask to type '${phrase}': ${message}`)
      return 'approved'
    }

    logger.warn(message)
    if (await this.prompts.text(`Type '${phrase}' to confirm`) === phrase) return 'approved'
    logger.info('Confirmation text did not match.')
    return 'declined'
  }
}
