import type { DraftStore } from "../data/draftStore.js";
import { errorFields, log } from "../logger.js";
import type { DraftEngine } from "./drafting/draftEngine.js";

export type DraftSweeperOptions = {
  engine: DraftEngine;
  store: DraftStore;
  intervalMs: number;
  batchSize: number;
  clock?: () => Date;
};

/**
 * Finds expired turns and reports each through `engine.expireTurn` with the
 * version it observed. Several sweepers (or a sweeper racing a client) are
 * safe: the version check lets one expiry through per turn.
 */
export function startDraftSweeper(options: DraftSweeperOptions) {
  const clock = options.clock ?? (() => new Date());
  let running = false;

  async function runOnce(): Promise<number> {
    if (running) return 0;
    running = true;
    let committed = 0;
    try {
      const expired = await options.store.listExpiredTurns(clock(), options.batchSize);
      for (const turn of expired) {
        try {
          const result = await options.engine.expireTurn({
            draft_id: turn.id,
            expected_version: turn.version
          });
          if (result.ok) {
            committed += 1;
          } else {
            log({
              level: "debug",
              msg: "draft_sweeper_skipped",
              draft_id: turn.id,
              version: turn.version,
              code: result.code
            });
          }
        } catch (err) {
          log({
            level: "error",
            msg: "draft_sweeper_tick_failed",
            draft_id: turn.id,
            ...errorFields(err)
          });
        }
      }
    } catch (err) {
      log({
        level: "error",
        msg: "draft_sweeper_failed",
        ...errorFields(err)
      });
    } finally {
      running = false;
    }
    return committed;
  }

  const intervalId = setInterval(() => {
    void runOnce();
  }, options.intervalMs);

  return {
    runOnce,
    stop: () => clearInterval(intervalId)
  };
}
