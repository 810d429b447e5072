import { parseRecords, previewRecord } from "../parser/csv-parser.js";
import { ParseError, describeError } from "../utils/errors.js";
import { formatSeconds, startTimer } from "../utils/timer.js";
import type {
  ItemProcessor,
  Locator,
  ProcessorContext,
  WorkResult,
} from "./types.js";

/**
 * Fetch, parse and preview one locator.
 *
 * Never rejects: any failure is logged with the locator and worker id and
 * returned as a failed result, so one bad resource cannot stop the run.
 */
export async function processItem(
  locator: Locator,
  workerId: number,
  context: ProcessorContext,
): Promise<WorkResult> {
  const { logger } = context;
  const elapsed = startTimer(context.clock);
  const label = `worker=${workerId} locator=${locator}`;

  let result: WorkResult;

  try {
    logger.info(`worker=${workerId} fetching ${locator}`);
    const raw = await context.client.fetch(locator, {
      timeoutMs: context.timeoutMs,
    });

    logger.info(`worker=${workerId} parsing ${locator}`);
    const recordSet = parseRecords(raw, context.parseOptions);

    await context.simulator.run(context.processingDelayMs);

    const preview = previewRecord(recordSet);
    if (!preview) {
      throw new ParseError("malformed", "Parsed record set has no rows");
    }

    logger.info(`worker=${workerId} finished parsing ${locator}`);
    logger.info(`First row preview for ${locator}: ${JSON.stringify(preview)}`);

    result = {
      status: "ok",
      locator,
      workerId,
      preview,
      rowCount: recordSet.rows.length,
      durationMs: elapsed(),
    };
  } catch (error) {
    logger.error(
      `worker=${workerId} error processing ${locator}: ${describeError(error)}`,
      error,
    );
    result = {
      status: "failed",
      locator,
      workerId,
      error,
      durationMs: elapsed(),
    };
  }

  logger.info(`${label} -> took: ${formatSeconds(result.durationMs)}`);
  return result;
}

export function createItemProcessor(context: ProcessorContext): ItemProcessor {
  return (locator, workerId) => processItem(locator, workerId, context);
}
