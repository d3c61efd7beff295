import type { ListWatchRequest, Watch } from "@chrono/shared";
import type { LifecycleContext } from "./context.js";
import {
  ConflictError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "./errors.js";
import { newId } from "./ids.js";
import { attemptSync, type Result } from "./result.js";
import { commitWatch, releaseAbandonedWatchClaim } from "./storage/commit.js";

function requireText(value: string | undefined, field: string): string {
  const trimmed = (value ?? "").trim();
  if (!trimmed) throw new ValidationError(`${field} is required`, { field });
  return trimmed;
}

/**
 * Ledger side of listings: a watch enters the ledger when it is listed and
 * only leaves LISTED through an escrow or an explicit delist.
 */
export class WatchRegistry {
  constructor(private readonly ctx: LifecycleContext) {}

  listWatch(request: ListWatchRequest): Result<Watch> {
    return attemptSync(() => {
      const serial = requireText(request.serial, "serial");
      if (this.ctx.store.getWatchBySerial(serial)) {
        throw new ConflictError(`serial ${serial} is already registered`, { serial });
      }

      const now = this.ctx.clock();
      const watch: Watch = {
        watchId: newId("WCH", now),
        serial,
        brand: requireText(request.brand, "brand"),
        model: requireText(request.model, "model"),
        category: requireText(request.category, "category").toLowerCase(),
        ownerId: requireText(request.ownerId, "ownerId"),
        ownerChainKey: request.ownerChainKey?.trim() || undefined,
        state: "LISTED",
        version: 1,
        listedAt: now.toISOString(),
        updatedAt: now.toISOString(),
      };
      if (!this.ctx.store.insertWatch(watch)) {
        throw new ConflictError(`serial ${serial} is already registered`, { serial });
      }
      this.ctx.logger.info({ watchId: watch.watchId, serial }, "watch listed");
      return watch;
    });
  }

  getWatch(watchId: string): Result<Watch> {
    return attemptSync(() => this.load(watchId));
  }

  listWatches(): Watch[] {
    return this.ctx.store.listWatches();
  }

  delistWatch(watchId: string, ownerId: string): Result<Watch> {
    return attemptSync(() => {
      const now = this.ctx.clock();
      const watch = releaseAbandonedWatchClaim(this.ctx.store, this.load(watchId), now, this.ctx.config.claimLeaseMs);
      this.assertOwner(watch, ownerId);
      if (watch.activeContractId) {
        throw new ConflictError(`watch ${watchId} has an active escrow`, {
          contractId: watch.activeContractId,
        });
      }
      if (watch.state !== "LISTED") {
        throw new InvalidStateError(`only LISTED watches can be delisted (is ${watch.state})`);
      }
      const next = commitWatch(this.ctx.store, watch, { state: "DELISTED" }, now);
      this.ctx.logger.info({ watchId }, "watch delisted");
      return next;
    });
  }

  /** Puts a sold or delisted watch back on the market; resale starts here. */
  relistWatch(watchId: string, ownerId: string): Result<Watch> {
    return attemptSync(() => {
      const watch = this.load(watchId);
      this.assertOwner(watch, ownerId);
      if (watch.state !== "SOLD" && watch.state !== "DELISTED") {
        throw new InvalidStateError(`only SOLD or DELISTED watches can be relisted (is ${watch.state})`);
      }
      const next = commitWatch(this.ctx.store, watch, { state: "LISTED" }, this.ctx.clock());
      this.ctx.logger.info({ watchId, ownerId }, "watch relisted");
      return next;
    });
  }

  private load(watchId: string): Watch {
    const watch = this.ctx.store.getWatch(watchId);
    if (!watch) throw new NotFoundError(`watch ${watchId} not found`, { watchId });
    return watch;
  }

  private assertOwner(watch: Watch, ownerId: string): void {
    if (watch.ownerId !== ownerId) {
      throw new InvalidStateError(`watch ${watch.watchId} is not owned by ${ownerId}`);
    }
  }
}
