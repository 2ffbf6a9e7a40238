/**
 * Tests for the XML data file rules.
 */
import { describe, it, expect } from 'vitest';
import {
  XmlDocumentRule,
  XmlDuplicateFieldsRule,
  XmlDuplicateRecordIdRule,
  XmlMarkupRule,
  XmlRecordRule,
  XmlViewPriorityRule,
  getViewPriority,
  isReplacingView,
} from '../../../../src/core/rules/xml.js';
import type { XmlFacts, SourceUnit } from '../../../../src/core/facts/types.js';
import type { IRule } from '../../../../src/core/rules/types.js';
import { ADDON_PATH, createAddon, odoo, ruleContext, xmlUnit } from './builders.js';

function run(rule: IRule, ...units: SourceUnit<XmlFacts>[]) {
  return rule.check(ruleContext(createAddon({ xml: units })));
}

function messages(rule: IRule, content: string): Array<[number | null, string]> {
  return run(rule, xmlUnit(content)).map((d) => [d.line, d.message]);
}

function firstRecord(content: string) {
  const unit = xmlUnit(content);
  const record = unit.facts?.root.children[0];
  if (!record) throw new Error('no record');
  return record;
}

describe('XmlDuplicateRecordIdRule', () => {
  const rule = new XmlDuplicateRecordIdRule();

  it('reports ids repeated across files of the same section', () => {
    const views = xmlUnit(odoo('<record id="view_order" model="ir.ui.view"/>'), 'views/a.xml');
    const more = xmlUnit(odoo('', '<record id="view_order" model="ir.ui.view"/>'), 'views/b.xml');

    expect(run(rule, views, more)).toEqual([
      {
        kind: 'xml_duplicate_record_id',
        file: `${ADDON_PATH}/views/a.xml`,
        line: 2,
        message: 'Duplicate xml record id "data/view_order_noupdate_0" in views/b.xml:3',
      },
    ]);
  });

  it('keys on data section and noupdate', () => {
    const data = xmlUnit(odoo('<record id="partner_1" model="res.partner"/>'), 'data/a.xml', 'data');
    const demo = xmlUnit(odoo('<record id="partner_1" model="res.partner"/>'), 'demo/a.xml', 'demo');
    const frozen = xmlUnit(
      odoo('<data noupdate="1">', '<record id="partner_1" model="res.partner"/>', '</data>'),
      'data/b.xml',
      'data'
    );

    expect(run(rule, data, demo, frozen)).toEqual([]);
  });
});

describe('XmlDuplicateFieldsRule', () => {
  const rule = new XmlDuplicateFieldsRule();

  it('reports a field repeated in one record', () => {
    const content = odoo(
      '<record id="partner_1" model="res.partner">',
      '<field name="name">A</field>',
      '<field name="email">a@example.com</field>',
      '<field name="name">B</field>',
      '</record>'
    );

    expect(messages(rule, content)).toEqual([[3, 'Duplicate xml field "name" in lines 5']]);
  });

  it('skips inheriting records', () => {
    const content = odoo(
      '<record id="view_inherit" model="ir.ui.view">',
      '<field name="inherit_id" ref="base.view_partner_form"/>',
      '<field name="name">A</field>',
      '<field name="name">B</field>',
      '</record>'
    );

    expect(messages(rule, content)).toEqual([]);
  });

  it('distinguishes fields by context', () => {
    const content = odoo(
      '<record id="partner_1" model="res.partner">',
      '<field name="name" context="{\'lang\': \'fr\'}">A</field>',
      '<field name="name">B</field>',
      '</record>'
    );

    expect(messages(rule, content)).toEqual([]);
  });
});

describe('XmlRecordRule', () => {
  const rule = new XmlRecordRule();

  it('reports the module name repeated in an id', () => {
    expect(messages(rule, odoo('<record id="sale.view_order" model="ir.ui.view"/>'))).toEqual([
      [2, 'Redundant module name <record id="sale.view_order" better using only <record id="view_order"'],
    ]);
  });

  it('reports replacing views under priority 99', () => {
    const content = odoo(
      '<record id="view_order_inherit" model="ir.ui.view">',
      '<field name="priority">20</field>',
      '<field name="arch" type="xml">',
      '<field name="partner_id" position="replace"/>',
      '</field>',
      '</record>'
    );

    expect(messages(rule, content)).toEqual([[2, 'Dangerous "replace" with priority 20 < 99']]);
  });

  it('reports deprecated tree attributes', () => {
    const content = odoo(
      '<record id="view_order_tree" model="ir.ui.view">',
      '<field name="arch" type="xml">',
      '<tree string="Orders" colors="red:state==\'cancel\'"/>',
      '</field>',
      '</record>'
    );

    expect(messages(rule, content)).toEqual([[4, 'Deprecated "<tree string, colors=..."']]);
  });

  it('reports users created without no_reset_password', () => {
    const content = odoo('<record id="user_demo" model="res.users">', '<field name="name">Demo</field>', '</record>');

    expect(messages(rule, content)).toEqual([
      [2, "record res.users without context=\"{'no_reset_password': True}\""],
    ]);
  });

  it('reports filters without user_id', () => {
    const content = odoo('<record id="filter_mine" model="ir.filters">', '<field name="name">Mine</field>', '</record>');

    expect(messages(rule, content)).toEqual([[2, 'Dangerous filter without explicit `user_id`']]);
  });
});

describe('XmlDocumentRule', () => {
  const rule = new XmlDocumentRule();

  it('reports <odoo><data> and <openerp> roots', () => {
    const content = ['<openerp>', '<data>', '</data>', '</openerp>', ''].join('\n');

    expect(messages(rule, content)).toEqual([
      [1, 'Use <odoo> instead of <odoo><data>'],
      [1, 'Deprecated <openerp> xml node, use <odoo>'],
    ]);
  });

  it('reports deprecated directives inside templates only', () => {
    const content = odoo(
      '<template id="report_order">',
      '<span t-esc="o.amount" t-esc-options="{}"/>',
      '</template>',
      '<record id="x" model="ir.ui.view" t-raw-options="{}"/>'
    );

    expect(messages(rule, content)).toEqual([[3, 'Deprecated QWeb directive "t-esc-options". Use "t-options"']]);
  });

  it('reports absolute resources without a plain extension', () => {
    const content = odoo(
      '<template id="assets">',
      '<link href="/sale/static/src/css/style.css%22"/>',
      '<script src="/sale/static/src/js/main.js"/>',
      '</template>'
    );

    expect(messages(rule, content)).toEqual([[3, 'Resource contains invalid character']]);
  });
});

describe('XmlMarkupRule', () => {
  const rule = new XmlMarkupRule();

  it('reports active_id in contexts', () => {
    const content = odoo('<button name="open" type="object" context="{\'default_order_id\': active_id}"/>');

    expect(messages(rule, content)).toEqual([
      [2, 'Deprecated use of "active_id" in context="{\'default_order_id\': active_id}..."'],
    ]);
  });

  it('reports alerts without role and buttons without type', () => {
    const content = odoo('<div class="alert alert-info">Note</div>', '<button name="action_confirm"/>');

    expect(messages(rule, content)).toEqual([
      [2, 'Element with class "alert alert-info" should have role="alert", role="alertdialog", or role="status"'],
      [3, 'Button "action_confirm" is missing type attribute'],
    ]);
  });

  it('accepts alert links and special buttons', () => {
    const content = odoo('<a class="alert-link">More</a>', '<button special="cancel"/>', '<div class="alert alert-info" role="status"/>');

    expect(messages(rule, content)).toEqual([]);
  });

  it('reports t-raw', () => {
    expect(messages(rule, odoo('<t t-raw="body"/>'))).toEqual([
      [2, 'Deprecated t-raw="body", use t-out with markup() instead'],
    ]);
  });

  it('reports quoted ids above the threshold unless ref() is used', () => {
    const content = odoo(
      '<field name="domain" domain="[(\'partner_id\', \'=\', \'4242\'), (\'x\', \'=\', \'7\')]"/>',
      '<field name="ctx" eval="{\'id\': \'4242\', \'ref\': ref(\'base.main\')}"/>'
    );

    expect(messages(rule, content)).toEqual([[2, 'Possible hardcoded ID "4242" in domain, consider using ref()']]);
  });
});

describe('XmlViewPriorityRule', () => {
  const rule = new XmlViewPriorityRule();

  function inheritingView(id: string, priority?: string): string[] {
    return [
      `<record id="${id}" model="ir.ui.view">`,
      '<field name="inherit_id" ref="sale.view_order_form"/>',
      ...(priority ? [`<field name="priority">${priority}</field>`] : []),
      '</record>',
    ];
  }

  it('reports views of the same parent with the same priority', () => {
    const content = odoo(...inheritingView('view_a'), ...inheritingView('view_b'), ...inheritingView('view_c', '30'));

    expect(messages(rule, content)).toEqual([
      [2, 'Views (view_a, view_b) inherit from "sale.view_order_form" with same priority 16'],
    ]);
  });
});

describe('view helpers', () => {
  it('reads the priority from eval or text', () => {
    expect(getViewPriority(firstRecord(odoo('<record id="a"><field name="priority" eval="5"/></record>')))).toBe(5);
    expect(getViewPriority(firstRecord(odoo('<record id="a"><field name="priority">x</field></record>')))).toBe(0);
    expect(getViewPriority(firstRecord(odoo('<record id="a"/>')))).toBe(0);
  });

  it('detects replace positions inside an xml arch', () => {
    const replacing = odoo('<record id="a"><field name="arch" type="xml"><div position="replace"/></field></record>');
    const text = odoo('<record id="a"><field name="arch"><div position="replace"/></field></record>');

    expect(isReplacingView(firstRecord(replacing))).toBe(true);
    expect(isReplacingView(firstRecord(text))).toBe(false);
  });
});
