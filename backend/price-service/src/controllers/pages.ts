import path from 'path';
import type { Request, Response, NextFunction } from 'express';

export const PAGE_TEMPLATES = {
  index: 'index.html',
  bitcoin: 'bitcoin.html',
  ethereum: 'ethereum.html',
  kline: 'kline.html',
} as const;

export type PageName = keyof typeof PAGE_TEMPLATES;

/**
 * 页面渲染：返回 templates 目录下的静态页面
 */
class PageController {
  private readonly templateDir: string;

  constructor(frontendDir: string) {
    this.templateDir = path.resolve(frontendDir, 'templates');
  }

  render = (page: PageName) => (req: Request, res: Response, next: NextFunction) => {
    res.sendFile(PAGE_TEMPLATES[page], { root: this.templateDir }, (error) => {
      if (error) next(error);
    });
  };
}

export default PageController;
