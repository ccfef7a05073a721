import { expect, test } from 'vitest';
import { TemplateSet } from '../../src/template/template.set.ts';
import { isResolutionError } from '../../src/type/resolution.type.ts';
import { page } from './test.util.ts';

test('TemplateSet - empty set renders the bare layout', () => {
  expect(new TemplateSet().render({})).toBe(page('', ''));
});

test('TemplateSet - head and body fill their slots', () => {
  const set = new TemplateSet();
  set.define('head', '<title>Site</title>');
  set.define('body', '<p>Hello</p>');

  expect(set.render({})).toBe(page('<title>Site</title>', '<p>Hello</p>'));
});

test('TemplateSet - context values are HTML-escaped', () => {
  const set = new TemplateSet();
  set.define('body', '<p>{{name}}</p>');

  expect(set.render({ name: '<b>' })).toBe(page('', '<p>&lt;b&gt;</p>'));
});

test('TemplateSet - a later definition replaces an earlier one', () => {
  const set = new TemplateSet();
  set.define('body', 'root', 'body.html.tmpl');
  set.define('body', 'nested', 'about/body.html.tmpl');

  expect(set.render({})).toBe(page('', 'nested'));
  expect(set.originOf('body')).toBe('about/body.html.tmpl');
});

test('TemplateSet - fragments are included by name', () => {
  const set = new TemplateSet();
  set.define('body', '<h1>{{> title}}</h1>');
  set.define('title', 'About us');

  expect(set.render({})).toBe(page('', '<h1>About us</h1>'));
});

test('TemplateSet - helpers are available to fragments', () => {
  const set = new TemplateSet({ shout: (s: string) => s.toUpperCase() });
  set.define('body', '{{shout word}}');

  expect(set.render({ word: 'hi' })).toBe(page('', 'HI'));
});

test('TemplateSet - unparseable source is malformed', () => {
  const set = new TemplateSet();

  expect.assertions(2);
  try {
    set.define('body', '{{#if ok}}never closed', 'body.html.tmpl');
  } catch (error) {
    expect(isResolutionError(error, 'MALFORMED')).toBe(true);
    expect(set.has('body')).toBe(false);
  }
});

test('TemplateSet - a missing fragment fails at render time', () => {
  const set = new TemplateSet();
  set.define('body', '{{> missing}}');

  expect(() => set.render({})).toThrow();
});

test('TemplateSet - has and names only report loaded fragments', () => {
  const set = new TemplateSet();
  expect(set.has('body')).toBe(false);

  set.define('title', 'x');
  set.define('body', 'y');

  expect(set.has('title')).toBe(true);
  expect(set.names()).toEqual(['body', 'title']);
});

test('TemplateSet - sets do not share fragments', () => {
  const first = new TemplateSet();
  first.define('body', 'first');

  expect(new TemplateSet().render({})).toBe(page('', ''));
});
