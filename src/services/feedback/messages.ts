import { CURRENCY_PREFIX } from '../../config/constants';

/**
 * User-facing texts for the bot
 */

export const messages = {
  success: {
    expenseAdded: (description: string, amount: string) => `Registro salvo com sucesso!\n${description}\nTotal: ${amount}`,
    filterCleared: 'Filtros removidos.',
    exported: (fileName: string) => `Arquivo gerado: ${fileName}`,
  },

  error: {
    noData: 'Nenhum registro encontrado.\n\nComece adicionando seu primeiro custo com /novo.',
    noMatches: 'Nenhum registro corresponde aos filtros atuais. Use /filtro limpar.',
    requiredFields: 'Preencha pelo menos Cliente e Descrição!',
    formExpired: 'O formulário expirou. Comece novamente com /novo.',
    invalidFilter: 'Filtro inválido. Use: /filtro cliente=Obra A categoria=Pintura status=Pago desde=01/03/2024',
    invalidFormat: 'Formato inválido. Use: /exportar csv | xlsx | txt | pdf',
    unknownUser: 'Não foi possível identificar o usuário.',
  },

  info: {
    helpFilter:
      'Filtros (combinados com E):\n' +
      '/filtro cliente=Obra A\n' +
      '/filtro categoria=Pintura status=Pendente\n' +
      '/filtro desde=01/03/2024\n' +
      '/filtro limpar',
    helpExport: '/exportar csv - Planilha CSV\n/exportar xlsx - Excel\n/exportar txt - Relatório em texto\n/exportar pdf - Relatório em PDF',
    reconfiguring: 'Reconfigurando planilha...',
    formCancelled: 'Registro cancelado.',
  },
};

/**
 * Amount with two decimals and thousands separators, e.g. R$ 1,234.50
 */
export function formatCurrency(amount: number): string {
  const formatted = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  }).format(amount);

  return `${CURRENCY_PREFIX} ${formatted}`;
}
