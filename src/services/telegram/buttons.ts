import { InlineKeyboard } from 'grammy';

/**
 * Inline keyboards for the bot menus and the enum questions of the expense form
 */

export function getMainMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📝 Novo Registro', 'new')
    .text('📊 Resumo', 'summary')
    .row()
    .text('📋 Registros', 'records')
    .text('📈 Gráficos', 'charts')
    .row()
    .text('📥 Exportar', 'export')
    .text('🔍 Filtros', 'filters')
    .row()
    .text('🔧 Reconfigurar', 'reconfigure');
}

export function getExportMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📄 CSV', 'export_csv')
    .text('📊 Excel', 'export_xlsx')
    .row()
    .text('📑 TXT', 'export_txt')
    .text('📕 PDF', 'export_pdf')
    .row()
    .text('« Voltar', 'back_main');
}

/**
 * One button per option, two per row. Callback data carries the option index
 * so long labels stay under Telegram's 64-byte limit.
 */
export function getChoiceKeyboard(options: readonly string[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  options.forEach((option, index) => {
    keyboard.text(option, `choice_${index}`);
    if (index % 2 === 1) keyboard.row();
  });
  return keyboard.row().text('✗ Cancelar', 'cancel_form');
}

export function getConfirmKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('💾 Salvar', 'confirm_save')
    .text('✗ Cancelar', 'cancel_form');
}

export function getCancelKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text('✗ Cancelar', 'cancel_form');
}

export function getBackKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text('« Voltar', 'back_main');
}

export function getRecordsKeyboard(page: number, totalPages: number): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  if (page > 1) keyboard.text('« Anterior', `records_${page - 1}`);
  if (page < totalPages) keyboard.text('Próxima »', `records_${page + 1}`);
  if (page > 1 || page < totalPages) keyboard.row();
  return keyboard.text('« Voltar', 'back_main');
}
