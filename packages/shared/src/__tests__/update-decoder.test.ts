/**
 * Tests for poll response decoding
 *
 * Covers:
 * - Envelope parsing and malformed bodies
 * - Decoding each update kind by tag
 * - Unknown update types
 */

import { describe, expect, it } from "vitest";
import { UpdateDecodeError, decodeUpdate, parseUpdateEnvelope } from "../update-decoder.js";

describe("parseUpdateEnvelope", () => {
	it("returns Type and Update from a valid body", () => {
		const envelope = parseUpdateEnvelope('{"Type":"Health","Update":{"cpu":10}}');

		expect(envelope).toEqual({ Type: "Health", Update: { cpu: 10 } });
	});

	it("throws UpdateDecodeError for invalid JSON", () => {
		expect(() => parseUpdateEnvelope("{ not json")).toThrow(UpdateDecodeError);
	});

	it("throws UpdateDecodeError when Type is missing", () => {
		expect(() => parseUpdateEnvelope('{"Update":{}}')).toThrow("Update body has no Type field");
	});

	it("throws UpdateDecodeError for a JSON array", () => {
		expect(() => parseUpdateEnvelope("[1,2]")).toThrow(UpdateDecodeError);
	});
});

describe("decodeUpdate", () => {
	describe("RequestForTimeline", () => {
		it("decodes a request scoped to one timeline", () => {
			const update = decodeUpdate('{"Type":"RequestForTimeline","Update":{"TimelineId":"tl-1"}}');

			expect(update).toEqual({ kind: "RequestForTimeline", timelineId: "tl-1" });
		});

		it("decodes a request without payload as a request for all timelines", () => {
			const update = decodeUpdate('{"Type":"RequestForTimeline","Update":null}');

			expect(update).toEqual({ kind: "RequestForTimeline", timelineId: null });
		});

		it("treats the empty GUID as a request for all timelines", () => {
			const update = decodeUpdate(
				'{"Type":"RequestForTimeline","Update":{"TimelineId":"00000000-0000-0000-0000-000000000000"}}',
			);

			expect(update).toEqual({ kind: "RequestForTimeline", timelineId: null });
		});

		it("reads the timeline id from a payload sent as a JSON string", () => {
			const body = JSON.stringify({
				Type: "RequestForTimeline",
				Update: JSON.stringify({ TimelineId: "tl-9" }),
			});

			expect(decodeUpdate(body)).toEqual({ kind: "RequestForTimeline", timelineId: "tl-9" });
		});
	});

	describe("Timeline", () => {
		it("serializes an object payload with two-space indentation", () => {
			const update = decodeUpdate('{"Type":"Timeline","Update":{"Id":"tl-1","TimeLineHandlers":[]}}');

			expect(update).toEqual({
				kind: "Timeline",
				raw: '{\n  "Id": "tl-1",\n  "TimeLineHandlers": []\n}',
			});
		});

		it("keeps a string payload verbatim", () => {
			const update = decodeUpdate('{"Type":"Timeline","Update":"{\\"Id\\":\\"raw\\"}"}');

			expect(update).toEqual({ kind: "Timeline", raw: '{"Id":"raw"}' });
		});

		it("rejects a Timeline update without payload", () => {
			expect(() => decodeUpdate('{"Type":"Timeline"}')).toThrow("Timeline update has no payload");
		});
	});

	describe("TimelinePartial", () => {
		it("decodes handlers and events", () => {
			const body = JSON.stringify({
				Type: "TimelinePartial",
				Update: {
					TimeLineHandlers: [
						{ HandlerType: "Http", TimeLineEvents: [{ Command: "http://example.test/", TrackableId: null }] },
					],
				},
			});

			const update = decodeUpdate(body);

			expect(update.kind).toBe("TimelinePartial");
			if (update.kind === "TimelinePartial") {
				expect(update.timeline.TimeLineHandlers).toHaveLength(1);
				expect(update.timeline.TimeLineHandlers[0].HandlerType).toBe("Http");
				expect(update.timeline.TimeLineHandlers[0].TimeLineEvents[0].Command).toBe("http://example.test/");
			}
		});

		it("rejects a payload whose handlers have no HandlerType", () => {
			const body = JSON.stringify({
				Type: "TimelinePartial",
				Update: { TimeLineHandlers: [{ TimeLineEvents: [] }] },
			});

			expect(() => decodeUpdate(body)).toThrow("TimelinePartial update is not a timeline");
		});
	});

	describe("Health", () => {
		it("decodes the health snapshot", () => {
			expect(decodeUpdate('{"Type":"Health","Update":{"cpu":10}}')).toEqual({
				kind: "Health",
				health: { cpu: 10 },
			});
		});

		it("rejects a scalar health payload", () => {
			expect(() => decodeUpdate('{"Type":"Health","Update":42}')).toThrow(UpdateDecodeError);
		});
	});

	it("decodes an unrecognized type as Unknown", () => {
		expect(decodeUpdate('{"Type":"Reboot","Update":{}}')).toEqual({ kind: "Unknown", type: "Reboot" });
	});
});
