import { Router } from 'express';
import PageController from '@/controllers/pages';

export const createPageRouter = (pages: PageController): Router => {
  const router = Router();

  router.get('/', pages.render('index'));
  router.get('/bitcoin', pages.render('bitcoin'));
  router.get('/ethereum', pages.render('ethereum'));
  router.get('/kline', pages.render('kline'));

  return router;
};
