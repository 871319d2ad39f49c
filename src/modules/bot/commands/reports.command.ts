import type { Bot } from 'grammy'
import type { BotContext } from '../core/bot.middleware'
import { CLEAR_TEXT, HELP_TEXT } from '../elements/help'
import type { ReportsService } from '../reports.service'

type Report = 'balance' | 'accounts' | 'categories' | 'budgets' | 'summary'

const REPORTS: readonly Report[] = ['balance', 'accounts', 'categories', 'budgets', 'summary']

export const reportCommands = (bot: Bot<BotContext>, reports: ReportsService) => {
	for (const name of REPORTS) {
		bot.command(name, async ctx => {
			if (!ctx.from) return
			const text = await reports[name](String(ctx.from.id))
			await ctx.reply(text, { parse_mode: 'HTML' })
		})
	}

	bot.command('help', async ctx => {
		await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' })
	})

	bot.command('clear', async ctx => {
		await ctx.reply(CLEAR_TEXT)
	})
}
