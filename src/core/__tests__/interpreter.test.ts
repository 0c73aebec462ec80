import test from 'node:test';
import assert from 'node:assert/strict';

import { createInterpreter, interpret, interpretStep } from '../interpreter.js';
import { DEFAULT_SELECTORS } from '../../config/defaults.js';

test('navigation step extracts the URL', () => {
  assert.deepEqual(interpret('导航到 https://example.com'), {
    kind: 'navigate',
    url: 'https://example.com',
  });
});

test('URL extraction stops at whitespace, brackets and commas', () => {
  assert.deepEqual(interpret('open (https://example.com/a?b=1) now'), {
    kind: 'navigate',
    url: 'https://example.com/a?b=1',
  });
  assert.deepEqual(interpret('访问 https://example.com/path，然后等待'), {
    kind: 'navigate',
    url: 'https://example.com/path',
  });
  assert.deepEqual(interpret('Visit http://localhost:3000/login, then log in'), {
    kind: 'navigate',
    url: 'http://localhost:3000/login',
  });
});

test('navigation keyword without a URL falls back to the default no-op', () => {
  // "wait" would match a later rule, but the navigate rule skips straight to the default
  assert.deepEqual(interpretStep('打开首页 and wait'), {
    rule: 'default',
    request: { kind: 'wait_fixed', timeout: 1000 },
  });
});

test('search input step fills the search box with the quoted term', () => {
  assert.deepEqual(interpret("搜索框输入 'Playwright'"), {
    kind: 'fill',
    selector: DEFAULT_SELECTORS.searchBox,
    text: 'Playwright',
  });
  assert.deepEqual(interpret('Enter "node test" in the search field'), {
    kind: 'fill',
    selector: DEFAULT_SELECTORS.searchBox,
    text: 'node test',
  });
});

test('search input without a quoted term continues down the chain', () => {
  assert.deepEqual(interpretStep('在搜索框输入关键词后点击'), {
    rule: 'click',
    request: { kind: 'click', selector: DEFAULT_SELECTORS.submitButton },
  });
});

test('click picks the submit heuristic for search or button steps', () => {
  assert.deepEqual(interpret('点击搜索按钮'), {
    kind: 'click',
    selector: DEFAULT_SELECTORS.submitButton,
  });
  assert.deepEqual(interpret('Click the Submit button'), {
    kind: 'click',
    selector: DEFAULT_SELECTORS.submitButton,
  });
});

test('other clicks use the generic clickable heuristic', () => {
  assert.deepEqual(interpret('点击第一个链接'), {
    kind: 'click',
    selector: DEFAULT_SELECTORS.clickable,
  });
});

test('verify title reads the title; other checks wait 2s', () => {
  assert.deepEqual(interpretStep("验证页面标题包含'百度'"), {
    rule: 'verify',
    request: { kind: 'get_title' },
  });
  assert.deepEqual(interpret('验证搜索结果页面包含相关内容'), {
    kind: 'wait_fixed',
    timeout: 2000,
  });
  assert.deepEqual(interpret('Check the page TITLE'), { kind: 'get_title' });
});

test('wait step waits 3s', () => {
  assert.deepEqual(interpretStep('等待搜索结果加载'), {
    rule: 'wait',
    request: { kind: 'wait_fixed', timeout: 3000 },
  });
});

test('unrecognized text yields the default 1s wait', () => {
  assert.deepEqual(interpretStep('做点什么'), {
    rule: 'default',
    request: { kind: 'wait_fixed', timeout: 1000 },
  });
});

test('rule order: navigation wins over later keywords', () => {
  assert.deepEqual(interpret('打开 https://example.com 并点击按钮'), {
    kind: 'navigate',
    url: 'https://example.com',
  });
});

test('interpretation is pure', () => {
  const steps = [
    '导航到 https://example.com',
    "搜索框输入 'Playwright'",
    '点击搜索按钮',
    '验证页面标题',
    '等待',
    '做点什么',
  ];
  for (const step of steps) {
    assert.deepEqual(interpret(step), interpret(step));
  }
});

test('a custom selector profile replaces the built-in heuristics', () => {
  const interpretWith = createInterpreter({
    searchBox: '#search',
    submitButton: 'button[type=submit]',
    clickable: '.card',
  });
  assert.deepEqual(interpretWith("search: input 'shoes'").request, {
    kind: 'fill',
    selector: '#search',
    text: 'shoes',
  });
  assert.deepEqual(interpretWith('click it').request, {
    kind: 'click',
    selector: '.card',
  });
});
