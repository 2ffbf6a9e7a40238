/**
 * Tests for the Python model extractor.
 */
import { describe, it, expect } from 'vitest';
import { PythonExtractor } from '../../../src/validators/python.js';
import type { ModelFact } from '../../../src/core/facts/types.js';

const extractor = new PythonExtractor();

function extract(content: string) {
  return extractor.extract({ path: '/addons/sale/models/sale.py', relativePath: 'models/sale.py', content });
}

function onlyModel(content: string): ModelFact {
  const unit = extract(content);
  expect(unit.error).toBeNull();
  const models = unit.facts?.models ?? [];
  expect(models).toHaveLength(1);
  return models[0];
}

const SALE_ORDER = [
  'from odoo import api, fields, models, _',
  '',
  '',
  'class SaleOrder(models.Model):',
  "    _name = 'sale.order'",
  "    _inherit = ['mail.thread', 'mail.activity.mixin']",
  '    _description = "Sales Order"',
  '',
  "    partner_id = fields.Many2one('res.partner', 'Customer', help=\"Who buys\")",
  '    note = fields.Text(_("Notes"))',
  "    amount = fields.Monetary(compute='_compute_amount', compute_sudo=False, tracking=True)",
  "    state = fields.Selection(selection=[('draft', 'Draft')], string='Status')",
  '    _secret = fields.Char()',
  '',
  "    @api.depends('amount')",
  '    def _compute_amount(self):',
  '        """Compute the amount."""',
  '        pass',
  '',
  '    def action_confirm(self):',
  '        return True',
  '',
].join('\n');

describe('PythonExtractor', () => {
  it('has correct language and extensions', () => {
    expect(extractor.language).toBe('python');
    expect(extractor.supportedExtensions).toEqual(['.py']);
  });

  describe('model attributes', () => {
    it('reads _name, _inherit and _description', () => {
      const model = onlyModel(SALE_ORDER);

      expect(model.className).toBe('SaleOrder');
      expect(model.name).toBe('sale.order');
      expect(model.inherit).toEqual(['mail.thread', 'mail.activity.mixin']);
      expect(model.description).toBe('Sales Order');
      expect(model.bases).toEqual(['models.Model']);
      expect(model.isOdooModel).toBe(true);
      expect(model.location).toEqual({ line: 4, column: 1 });
      expect(model.file).toBe('/addons/sale/models/sale.py');
      expect(model.hasMailThread).toBe(false);
    });

    it('normalizes a single _inherit string to a list', () => {
      const model = onlyModel("class Partner(models.Model):\n    _inherit = 'res.partner'\n");

      expect(model.inherit).toEqual(['res.partner']);
      expect(model.name).toBeNull();
      expect(model.isOdooModel).toBe(true);
    });

    it('marks plain classes as non-models', () => {
      const model = onlyModel('class Helper:\n    value = 1\n');

      expect(model.isOdooModel).toBe(false);
      expect(model.fields).toEqual([]);
    });

    it('recognizes models by base class alone', () => {
      expect(onlyModel('class Wizard(models.TransientModel):\n    pass\n').isOdooModel).toBe(true);
    });
  });

  describe('fields', () => {
    const fields = () => onlyModel(SALE_ORDER).fields;

    it('lists every field declaration in order', () => {
      expect(fields().map((f) => [f.name, f.type])).toEqual([
        ['partner_id', 'Many2one'],
        ['note', 'Text'],
        ['amount', 'Monetary'],
        ['state', 'Selection'],
        ['_secret', 'Char'],
      ]);
    });

    it('reads relational positional arguments', () => {
      const [partner] = fields();

      expect(partner.comodel).toBe('res.partner');
      expect(partner.label).toBe('Customer');
      expect(partner.help).toBe('Who buys');
      expect(partner.location).toEqual({ line: 9, column: 5 });
    });

    it('looks through translation markers', () => {
      expect(fields()[1].label).toBe('Notes');
    });

    it('reads compute options', () => {
      const amount = fields()[2];

      expect(amount.compute).toBe('_compute_amount');
      expect(amount.computeSudo).toBe(false);
      expect(amount.tracking).toBe(true);
      expect(amount.label).toBeNull();
    });

    it('reads the selection keyword', () => {
      const state = fields()[3];

      expect(state.selection).toBe(true);
      expect(state.label).toBe('Status');
    });

    it('ignores a positional selection list and the label after it', () => {
      const [state, ref] = onlyModel(
        [
          'class A(models.Model):',
          "    _name = 'a'",
          "    state = fields.Selection([('a', 'A')], 'Status', related='partner_id.state')",
          "    ref = fields.Reference([('res.partner', 'Partner')], 'Target')",
        ].join('\n')
      ).fields;

      expect(state.selection).toBe(false);
      expect(state.label).toBeNull();
      expect(state.related).toBe('partner_id.state');
      expect(ref.selection).toBe(false);
      expect(ref.label).toBeNull();
    });

    it('takes a leading string as the label of a Selection', () => {
      const [field] = onlyModel(
        "class A(models.Model):\n    _name = 'a'\n    kind = fields.Selection('Kind', selection=[('x', 'X')])\n"
      ).fields;

      expect(field.label).toBe('Kind');
      expect(field.selection).toBe(true);
    });

    it('marks underscore fields private', () => {
      expect(fields()[4].isPrivate).toBe(true);
      expect(fields()[0].isPrivate).toBe(false);
    });

    it('treats a non-constant tracking value as enabled', () => {
      const [field] = onlyModel(
        "class A(models.Model):\n    _name = 'a'\n    x = fields.Char(tracking=LEVEL)\n"
      ).fields;

      expect(field.tracking).toBe(true);
    });

    it('reads related fields and keyword comodels', () => {
      const [field] = onlyModel(
        "class A(models.Model):\n    _name = 'a'\n    y = fields.Many2one(comodel_name='res.users', related='x.user_id')\n"
      ).fields;

      expect(field.comodel).toBe('res.users');
      expect(field.related).toBe('x.user_id');
    });
  });

  describe('methods', () => {
    it('reads decorators and docstrings', () => {
      const [compute, confirm] = onlyModel(SALE_ORDER).methods;

      expect(compute).toEqual({
        name: '_compute_amount',
        location: { line: 16, column: 5 },
        isPrivate: true,
        isMagic: false,
        isAsync: false,
        docstring: 'Compute the amount.',
        decorators: ['depends'],
      });
      expect(confirm.name).toBe('action_confirm');
      expect(confirm.docstring).toBeNull();
      expect(confirm.decorators).toEqual([]);
    });

    it('flags dunder methods as magic', () => {
      const [method] = onlyModel('class A(models.Model):\n    def __str__(self):\n        return "a"\n').methods;

      expect(method.isMagic).toBe(true);
      expect(method.isPrivate).toBe(true);
    });
  });

  describe('syntax errors', () => {
    it('returns an error and no models', () => {
      const unit = extract('class Broken(:\n    pass\n');

      expect(unit.error).not.toBeNull();
      expect(unit.facts?.models).toEqual([]);
    });
  });
});
