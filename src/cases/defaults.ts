import type { TestCase } from '../schema/index.js';

/** Built-in examples used when no test-case documents are available. */
export const DEFAULT_TEST_CASES: readonly TestCase[] = [
  {
    id: 'TC001',
    name: '访问百度首页',
    description: "打开百度网站首页，验证页面标题包含'百度'",
    steps: ['导航到 https://www.baidu.com', "验证页面标题包含'百度'"],
  },
  {
    id: 'TC002',
    name: '搜索功能测试',
    description: "在百度搜索框中输入'Playwright'并搜索，验证搜索结果页面",
    steps: [
      '导航到 https://www.baidu.com',
      "找到搜索框并输入'Playwright'",
      '点击搜索按钮',
      '等待搜索结果加载',
      '验证搜索结果页面包含相关内容',
    ],
  },
];
