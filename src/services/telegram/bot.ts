import { Bot, Context, InputFile } from 'grammy';
import { DEFAULT_MESSAGES } from '../../config/constants';
import { ExportFormat } from '../../types/export';
import { toCalendarDate } from '../../utils/date';
import { NO_FILTERS } from '../analytics/filters';
import { CostDashboard } from '../dashboard';
import { applyDraftAnswer, CHOICE_STEPS, describeDraft, DraftStep, ExpenseDraft, STEP_PROMPTS } from '../expense/draft';
import { computeAmounts } from '../expense/entry';
import { isExportFormat } from '../export';
import { formatCurrency, messages } from '../feedback/messages';
import {
  clearUserContext,
  clearUserFilters,
  getUserContext,
  getUserFilters,
  setUserContext,
  setUserFilters,
  UserState,
} from '../state/user-context';
import {
  getBackKeyboard,
  getCancelKeyboard,
  getChoiceKeyboard,
  getConfirmKeyboard,
  getExportMenuKeyboard,
  getMainMenuKeyboard,
  getRecordsKeyboard,
} from './buttons';
import { parseFilterCommand } from './filter-command';
import { formatCharts, formatFilterHelp, formatRecordsPage, formatSummary } from './format';
import { deleteUserMessage, sendFreshResponse } from './message-manager';

function commandArgs(ctx: Context): string {
  const text = ctx.message?.text ?? '';
  return text.replace(/^\/\S+\s*/, '');
}

async function askStep(ctx: Context, step: DraftStep, draft: ExpenseDraft): Promise<void> {
  const options = CHOICE_STEPS[step];
  const summary = describeDraft(draft);
  const prompt = summary ? `${summary}\n\n${STEP_PROMPTS[step]}` : STEP_PROMPTS[step];

  await ctx.reply(prompt, { reply_markup: options ? getChoiceKeyboard(options) : getCancelKeyboard() });
}

async function startForm(ctx: Context, userId: string): Promise<void> {
  setUserContext(userId, UserState.FILLING_EXPENSE, 'date', {});
  await askStep(ctx, 'date', {});
}

/**
 * Feed one answer into the user's draft and ask the next question,
 * or show the confirmation once every field is filled.
 */
async function handleFormAnswer(ctx: Context, userId: string, answer: string): Promise<void> {
  const context = getUserContext(userId);
  if (!context || context.state !== UserState.FILLING_EXPENSE || !context.step) {
    await ctx.reply(messages.error.formExpired, { reply_markup: getMainMenuKeyboard() });
    return;
  }

  const outcome = applyDraftAnswer(context.draft, context.step, answer, toCalendarDate(new Date()));
  if (!outcome.ok) {
    await ctx.reply(outcome.error);
    await askStep(ctx, context.step, context.draft);
    return;
  }

  if (outcome.next) {
    setUserContext(userId, UserState.FILLING_EXPENSE, outcome.next, outcome.draft);
    await askStep(ctx, outcome.next, outcome.draft);
    return;
  }

  setUserContext(userId, UserState.CONFIRMING_EXPENSE, null, outcome.draft);
  await ctx.reply(`Confira o registro:\n\n${describeDraft(outcome.draft)}`, { reply_markup: getConfirmKeyboard() });
}

async function saveDraft(ctx: Context, dashboard: CostDashboard, userId: string): Promise<void> {
  const context = getUserContext(userId);
  if (!context || context.state !== UserState.CONFIRMING_EXPENSE) {
    await ctx.reply(messages.error.formExpired, { reply_markup: getMainMenuKeyboard() });
    return;
  }

  const result = await dashboard.submit(context.draft);
  if (!result.success) {
    await ctx.reply(`❌ ${result.message}`, { reply_markup: getConfirmKeyboard() });
    return;
  }

  clearUserContext(userId);
  const { description = '', quantity = 0, unitPrice = 0, discountPercent = 0 } = context.draft;
  const { total } = computeAmounts(quantity, unitPrice, discountPercent);
  await ctx.reply(`✅ ${messages.success.expenseAdded(description, formatCurrency(total))}`, {
    reply_markup: getMainMenuKeyboard(),
  });
}

async function sendSummary(ctx: Context, dashboard: CostDashboard, userId: string): Promise<void> {
  const criteria = getUserFilters(userId);
  const view = await dashboard.view(criteria);

  if (view.error) {
    await sendFreshResponse(ctx, userId, `❌ ${view.error}`);
    return;
  }
  if (view.totalRecords === 0) {
    await sendFreshResponse(ctx, userId, messages.error.noData);
    return;
  }
  await sendFreshResponse(ctx, userId, formatSummary(view, criteria));
}

async function sendCharts(ctx: Context, dashboard: CostDashboard, userId: string): Promise<void> {
  const view = await dashboard.view(getUserFilters(userId));

  if (view.error) {
    await sendFreshResponse(ctx, userId, `❌ ${view.error}`);
    return;
  }
  if (view.rows.length === 0) {
    await sendFreshResponse(ctx, userId, view.totalRecords === 0 ? messages.error.noData : messages.error.noMatches);
    return;
  }
  await sendFreshResponse(ctx, userId, formatCharts(view));
}

async function sendRecords(ctx: Context, dashboard: CostDashboard, userId: string, page: number): Promise<void> {
  const view = await dashboard.view(getUserFilters(userId));

  if (view.error) {
    await sendFreshResponse(ctx, userId, `❌ ${view.error}`);
    return;
  }
  if (view.rows.length === 0) {
    await sendFreshResponse(ctx, userId, view.totalRecords === 0 ? messages.error.noData : messages.error.noMatches);
    return;
  }

  const records = formatRecordsPage(view.rows, page);
  await sendFreshResponse(ctx, userId, records.text, getRecordsKeyboard(records.page, records.totalPages));
}

async function sendFilterHelp(ctx: Context, dashboard: CostDashboard, userId: string): Promise<void> {
  const criteria = getUserFilters(userId);
  const view = await dashboard.view(criteria);
  await ctx.reply(formatFilterHelp(view, criteria), { reply_markup: getBackKeyboard() });
}

async function sendExport(ctx: Context, dashboard: CostDashboard, userId: string, format: ExportFormat): Promise<void> {
  const result = await dashboard.export(format, getUserFilters(userId));

  if (!result.success || !result.data || !result.fileName) {
    await ctx.reply(`❌ ${result.message}`, { reply_markup: getBackKeyboard() });
    return;
  }

  await ctx.replyWithDocument(new InputFile(result.data, result.fileName), {
    caption: messages.success.exported(result.fileName),
  });
}

async function reconfigure(ctx: Context, dashboard: CostDashboard, userId: string): Promise<void> {
  await ctx.reply(messages.info.reconfiguring);
  const result = await dashboard.reconfigure();

  let text = `${result.success ? '✅' : '❌'} ${result.message}`;
  for (const warning of result.warnings) {
    text += `\n⚠️ ${warning}`;
  }
  await sendFreshResponse(ctx, userId, text);
}

export function createBot(token: string, dashboard: CostDashboard): Bot {
  const bot = new Bot(token);

  bot.command('start', async (ctx) => {
    await ctx.reply(DEFAULT_MESSAGES.WELCOME, { reply_markup: getMainMenuKeyboard() });
  });

  bot.command('novo', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }
    await deleteUserMessage(ctx);
    await startForm(ctx, userId);
  });

  bot.command('resumo', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }
    await sendSummary(ctx, dashboard, userId);
  });

  bot.command('registros', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }
    await sendRecords(ctx, dashboard, userId, Number(commandArgs(ctx).trim()) || 1);
  });

  bot.command('graficos', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }
    await sendCharts(ctx, dashboard, userId);
  });

  bot.command('filtro', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }

    const args = commandArgs(ctx);
    if (!args) {
      await sendFilterHelp(ctx, dashboard, userId);
      return;
    }

    const parsed = parseFilterCommand(args, getUserFilters(userId));
    if (!parsed.ok) {
      await ctx.reply(`${parsed.error}\n\n${messages.error.invalidFilter}`);
      return;
    }

    if (parsed.criteria === NO_FILTERS) {
      clearUserFilters(userId);
      await ctx.reply(messages.success.filterCleared);
      return;
    }

    setUserFilters(userId, parsed.criteria);
    await sendSummary(ctx, dashboard, userId);
  });

  bot.command('exportar', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }

    const format = commandArgs(ctx).trim().toLowerCase();
    if (!format) {
      await ctx.reply(messages.info.helpExport, { reply_markup: getExportMenuKeyboard() });
      return;
    }
    if (!isExportFormat(format)) {
      await ctx.reply(messages.error.invalidFormat);
      return;
    }
    await sendExport(ctx, dashboard, userId, format);
  });

  bot.command('reconfigurar', async (ctx) => {
    const userId = ctx.from?.id.toString();
    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }
    await reconfigure(ctx, dashboard, userId);
  });

  /**
   * Button callbacks
   */
  bot.on('callback_query:data', async (ctx) => {
    const action = ctx.callbackQuery.data;
    const userId = ctx.from.id.toString();
    await ctx.answerCallbackQuery();

    switch (action) {
      case 'new':
        await startForm(ctx, userId);
        return;
      case 'summary':
        await sendSummary(ctx, dashboard, userId);
        return;
      case 'charts':
        await sendCharts(ctx, dashboard, userId);
        return;
      case 'filters':
        await sendFilterHelp(ctx, dashboard, userId);
        return;
      case 'records':
        await sendRecords(ctx, dashboard, userId, 1);
        return;
      case 'export':
        await ctx.reply(messages.info.helpExport, { reply_markup: getExportMenuKeyboard() });
        return;
      case 'reconfigure':
        await reconfigure(ctx, dashboard, userId);
        return;
      case 'confirm_save':
        await saveDraft(ctx, dashboard, userId);
        return;
      case 'cancel_form':
        clearUserContext(userId);
        await ctx.reply(messages.info.formCancelled, { reply_markup: getMainMenuKeyboard() });
        return;
      case 'back_main':
        await sendFreshResponse(ctx, userId, DEFAULT_MESSAGES.WELCOME);
        return;
    }

    if (action.startsWith('records_')) {
      await sendRecords(ctx, dashboard, userId, Number(action.replace('records_', '')));
      return;
    }

    if (action.startsWith('export_')) {
      const format = action.replace('export_', '');
      if (isExportFormat(format)) {
        await sendExport(ctx, dashboard, userId, format);
      }
      return;
    }

    if (action.startsWith('choice_')) {
      const context = getUserContext(userId);
      const options = context?.step ? CHOICE_STEPS[context.step] : undefined;
      const choice = options?.[Number(action.replace('choice_', ''))];

      if (!choice) {
        await ctx.reply(messages.error.formExpired, { reply_markup: getMainMenuKeyboard() });
        return;
      }
      await handleFormAnswer(ctx, userId, choice);
    }
  });

  bot.on('message:text', async (ctx) => {
    const text = ctx.message.text;
    const userId = ctx.from.id.toString();

    if (text.startsWith('/')) {
      return;
    }

    const context = getUserContext(userId);
    if (context?.state === UserState.FILLING_EXPENSE) {
      await handleFormAnswer(ctx, userId, text);
      return;
    }

    await ctx.reply(DEFAULT_MESSAGES.WELCOME, { reply_markup: getMainMenuKeyboard() });
  });

  bot.catch((error) => {
    console.error('[Bot] Unhandled error:', error.message);
  });

  console.log('[Bot] Commands registered');
  return bot;
}
