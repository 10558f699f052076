import { describe, it, expect } from 'vitest';
import {
  DateInputSchema,
  DecimalInputSchema,
  DiscountInputSchema,
  ExpenseFormSchema,
  NotesInputSchema,
  QuantityInputSchema,
  validateInput,
} from '../src/services/validation/schemas';

describe('Input Validation', () => {
  describe('Date', () => {
    it('should parse DD/MM/YYYY as a UTC calendar date', () => {
      const result = validateInput(DateInputSchema, ' 15/03/2024 ');
      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.data.getTime()).toBe(Date.UTC(2024, 2, 15));
      }
    });

    it('should reject impossible days', () => {
      const result = validateInput(DateInputSchema, '31/02/2024');
      expect(result).toEqual({ valid: false, error: 'Data inválida. Use DD/MM/AAAA (ex.: 15/03/2024)' });
    });

    it('should reject ISO dates', () => {
      expect(validateInput(DateInputSchema, '2024-03-15').valid).toBe(false);
    });
  });

  describe('Decimal', () => {
    it('should accept a comma or a dot', () => {
      expect(validateInput(DecimalInputSchema, '10,50')).toEqual({ valid: true, data: 10.5 });
      expect(validateInput(DecimalInputSchema, '10.5')).toEqual({ valid: true, data: 10.5 });
      expect(validateInput(DecimalInputSchema, '7')).toEqual({ valid: true, data: 7 });
    });

    it('should reject text and negative values', () => {
      expect(validateInput(DecimalInputSchema, 'abc').valid).toBe(false);
      expect(validateInput(DecimalInputSchema, '-5').valid).toBe(false);
    });

    it('should enforce the minimum quantity', () => {
      expect(validateInput(QuantityInputSchema, '0')).toEqual({ valid: false, error: 'Quantidade mínima é 0,01' });
      expect(validateInput(QuantityInputSchema, '0,01')).toEqual({ valid: true, data: 0.01 });
    });
  });

  describe('Discount', () => {
    it('should accept whole percentages up to 50', () => {
      expect(validateInput(DiscountInputSchema, '10')).toEqual({ valid: true, data: 10 });
      expect(validateInput(DiscountInputSchema, '50')).toEqual({ valid: true, data: 50 });
    });

    it('should reject values above 50', () => {
      expect(validateInput(DiscountInputSchema, '51')).toEqual({ valid: false, error: 'Desconto máximo é 50%' });
    });

    it('should reject fractions', () => {
      expect(validateInput(DiscountInputSchema, '2.5')).toEqual({
        valid: false,
        error: 'Desconto deve ser um número inteiro',
      });
    });
  });

  describe('Notes', () => {
    it('should treat a dash as empty', () => {
      expect(validateInput(NotesInputSchema, '-')).toEqual({ valid: true, data: '' });
      expect(validateInput(NotesInputSchema, ' entregar na obra ')).toEqual({ valid: true, data: 'entregar na obra' });
    });
  });

  describe('Expense Form', () => {
    const form = {
      date: new Date(Date.UTC(2024, 2, 15)),
      client: 'Obra A',
      category: 'Pintura',
      description: 'Tinta látex',
      quantity: 2,
      unitPrice: 50,
      discountPercent: 10,
      paymentStatus: 'Pago',
      paymentMethod: 'PIX',
    };

    it('should accept a complete form and default notes', () => {
      const result = validateInput(ExpenseFormSchema, form);
      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.data.notes).toBe('');
        expect(result.data.category).toBe('Pintura');
      }
    });

    it('should require client and description', () => {
      const result = validateInput(ExpenseFormSchema, { ...form, client: '   ' });
      expect(result).toEqual({ valid: false, error: 'Preencha pelo menos Cliente e Descrição!' });
    });

    it('should reject categories outside the list', () => {
      expect(validateInput(ExpenseFormSchema, { ...form, category: 'Alimentação' }).valid).toBe(false);
    });

    it('should reject a discount above 50', () => {
      expect(validateInput(ExpenseFormSchema, { ...form, discountPercent: 60 })).toEqual({
        valid: false,
        error: 'Desconto máximo é 50%',
      });
    });
  });
});
