export { createBot } from './bot';
export { deleteUserMessage, deletePreviousBotMessage, storeBotMessageId, sendFreshResponse } from './message-manager';
export { getMainMenuKeyboard, getExportMenuKeyboard, getChoiceKeyboard, getConfirmKeyboard, getCancelKeyboard, getBackKeyboard, getRecordsKeyboard } from './buttons';
export { parseFilterCommand } from './filter-command';
export { formatSummary, formatCharts, formatFilterHelp, formatRecordsPage, RECORDS_PAGE_SIZE, type RecordsPage } from './format';
