import createRouter from 'find-my-way';

import type { RequestHandler } from '../types/server.js';
import { HttpCode, SERVED_METHODS } from '../common/consts.js';
import { sendText } from './response.js';

const CATCH_ALL_ROUTE = '/*';

/**
 * Routes every `GET`/`HEAD` request to `serve`. Other methods get `405` and URLs the
 * router can't decode get `400`.
 */
export function createRequestRouter(serve: RequestHandler): RequestHandler {
  const router = createRouter({
    defaultRoute(_req, res) {
      res.setHeader('Allow', SERVED_METHODS.join(', '));
      sendText(res, HttpCode.MethodNotAllowed, '405 Method Not Allowed');
    },
    onBadUrl(_path, _req, res) {
      sendText(res, HttpCode.BadRequest, '400 Bad Request');
    },
  });

  router.on([...SERVED_METHODS], CATCH_ALL_ROUTE, (req, res) => serve(req, res));

  return async (req, res) => {
    // lookup hands back whatever the matched handler returns
    await router.lookup(req, res);
  };
}
