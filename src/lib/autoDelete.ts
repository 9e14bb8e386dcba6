/**
 * Grindboard — src/lib/autoDelete.ts
 * WHAT: Delete a message after a delay, best effort.
 * USAGE: autoDelete(channel.send({ content: "..." }), 10_000);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Message } from "discord.js";
import { logger } from "./logger.js";

/**
 * Never throws and never leaves a rejected promise behind. A send that
 * failed, a message already gone, or missing permissions are logged at debug.
 */
export function autoDelete(messageOrPromise: Promise<Message> | Message, ms = 30_000): void {
  Promise.resolve(messageOrPromise).then(
    (msg) => {
      const timer = setTimeout(() => {
        if (!msg.deletable) return;
        msg.delete().catch((err: unknown) => {
          logger.debug({ evt: "auto_delete_fail", messageId: msg.id, err }, "[autoDelete] delete failed");
        });
      }, ms);
      timer.unref();
    },
    (err: unknown) => {
      logger.debug({ evt: "auto_delete_send_fail", err }, "[autoDelete] message never sent");
    }
  );
}
