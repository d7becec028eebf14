/**
 * "report" display kind: a titled stack of sections, each rendered through
 * whichever kind it names.
 *
 * ```json
 * {
 *   "title": "Weekly",
 *   "sections": [
 *     { "heading": "Queue", "kind": "bar_chart", "data": { "open": 4, "closed": 9 } },
 *     { "kind": "table", "data": [{ "name": "build", "status": "ok" }] }
 *   ]
 * }
 * ```
 */

import {
  box,
  compose,
  createRenderConfig,
  hr,
  parseWith,
  type Block,
  type DisplayRenderer,
} from "@textblock/core";
import { z } from "zod";

/** Border plus padding taken by the surrounding box */
const FRAME_OVERHEAD = 4;

const SectionSchema = z.object({
  kind: z.string().min(1),
  data: z.unknown(),
  options: z.record(z.unknown()).optional(),
  heading: z.string().min(1).optional(),
});

const ReportSchema = z.object({
  title: z.string().optional(),
  sections: z.array(SectionSchema),
});

const ReportOptionsSchema = z
  .object({
    width: z.number().optional(),
    /** Blank lines between sections */
    spacing: z.number().optional(),
  })
  .strict();

function withHeading(heading: string | undefined, body: Block): Block {
  if (heading === undefined) {
    return body;
  }
  return compose([heading, hr(heading.length), body]);
}

export const renderReport: DisplayRenderer = (data, options, dispatcher) => {
  const report = parseWith(ReportSchema, data, "report");
  const opts = parseWith(ReportOptionsSchema, options, "report options");
  const width = opts.width ?? dispatcher.config.width;

  // Sections render at the width left inside the frame.
  const inner =
    report.title === undefined
      ? dispatcher
      : dispatcher.withConfig(createRenderConfig(width - FRAME_OVERHEAD));

  const sections = report.sections.map((section) =>
    withHeading(
      section.heading,
      inner.render(section.data, {
        kind: section.kind,
        options: section.options,
      })
    )
  );
  const body = compose(sections, { spacing: opts.spacing ?? 1 });

  if (report.title === undefined) {
    return body;
  }
  return box(body, { title: report.title, width }, dispatcher.config);
};
