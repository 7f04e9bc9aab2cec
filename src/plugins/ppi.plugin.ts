import type { FastifyBaseLogger } from "fastify";
import fp from "fastify-plugin";
import { PpiContext, type PpiContextOptions } from "../../services/ppi.context.ts";
import type { Logger } from "../../services/types.ts";

declare module "fastify" {
  interface FastifyInstance {
    ppi: PpiContext;
  }
}

export type PpiPluginOptions =
  | { context: PpiContext; closeOnShutdown?: boolean }
  | { open: Omit<PpiContextOptions, "log"> };

function serviceLogger(log: FastifyBaseLogger): Logger {
  return {
    info: (obj, msg) => log.info(obj, msg),
    warn: (obj, msg) => log.warn(obj, msg),
    debug: (obj, msg) => log.debug(obj, msg),
  };
}

/**
 * Decorate the app with a PpiContext. Either adopts an existing context or
 * opens one (logging through app.log) and closes it on shutdown.
 */
export const ppiPlugin = fp<PpiPluginOptions>(
  async function ppiPlugin(app, opts) {
    let ctx: PpiContext;
    let closeOnShutdown: boolean;
    if ("open" in opts) {
      ctx = await PpiContext.open({ ...opts.open, log: serviceLogger(app.log) });
      closeOnShutdown = true;
    } else {
      ctx = opts.context;
      closeOnShutdown = opts.closeOnShutdown ?? false;
    }

    app.decorate("ppi", ctx);

    app.addHook("onClose", async () => {
      if (closeOnShutdown) ctx.close();
    });
  },
  { name: "ppi" }
);
