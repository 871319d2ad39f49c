export const HELP_TEXT = [
	'<b>Bot Commands</b>',
	'',
	'<b>Account Management</b>',
	'/balance - View all account balances',
	'/accounts - List all your accounts',
	'',
	'<b>Categories</b>',
	'/categories - Browse your categories (with subcategories)',
	'',
	'<b>Transactions</b>',
	'/expense - Record an expense',
	'/expense 50 Coffee - Quick expense with amount &amp; description',
	'/income - Record income',
	'/income 3000 Salary - Quick income with amount &amp; description',
	'',
	'<b>Budgets</b>',
	'/budgets - View budget status',
	'',
	'<b>Reports</b>',
	'/summary - Monthly income/expense summary',
	'',
	'<b>Help</b>',
	'/help - Show this help message',
	'/start - Link your account',
	'/cancel - Cancel current operation',
	'/clear - Push old messages out of view',
	'',
	'<b>Tips:</b>',
	'- Amounts can include decimals (e.g., 50.50)',
	'- Use buttons to pick category and account',
	'- When creating a new category, you can set a parent and emoji icon',
	'- Just type the command alone for a guided flow'
].join('\n')

export const CLEAR_TEXT = `${'\n'.repeat(50)}Chat cleared.`

export const BOT_COMMANDS = [
	{ command: 'expense', description: 'Record an expense' },
	{ command: 'income', description: 'Record income' },
	{ command: 'balance', description: 'View account balances' },
	{ command: 'accounts', description: 'List your accounts' },
	{ command: 'categories', description: 'Browse your categories' },
	{ command: 'budgets', description: 'View budget status' },
	{ command: 'summary', description: 'Monthly summary' },
	{ command: 'cancel', description: 'Cancel current operation' },
	{ command: 'help', description: 'Help' },
	{ command: 'start', description: 'Link your account' }
]
