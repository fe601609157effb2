import { type Rng, assert, createRng, describe, test } from "@gridwork/testkit";
import {
  computeExplicitGridSizeInAxis,
  gridTrackListLength,
  initializeGridTracks,
  inspectTrackTemplate,
} from "../grid/explicitGrid.js";
import { createGridContainerStyle } from "../grid/style.js";
import {
  AUTO_FILL,
  AUTO_FIT,
  type NonRepeatedTrackSizingFunction,
  type TrackSizingFunction,
  auto,
  fr,
  length,
  minContent,
  minmax,
  percent,
  repeat,
} from "../grid/trackSizing.js";
import { type GridTrack, createTrackCounts } from "../grid/types.js";
import { AUTO_VALUE, ZERO_LENGTH, lengthValue } from "../style/dimension.js";
import { axisPair } from "../types.js";

const SEEDS = [1, 7, 42, 1337, 0xdecaf] as const;
const ITERATIONS = 60;
const noCalc = () => 0;

function randomTrack(rng: Rng): NonRepeatedTrackSizingFunction {
  switch (rng.int(0, 6)) {
    case 0:
      return length(rng.int(0, 60));
    case 1:
      return percent(rng.int(0, 40) / 100);
    case 2:
      return minmax(lengthValue(rng.int(0, 30)), { kind: "fr", flex: 1 });
    case 3:
      return length(rng.int(5, 25));
    case 4:
      return fr(rng.int(1, 3));
    case 5:
      return minContent();
    default:
      return auto();
  }
}

function randomTracks(rng: Rng, min: number, max: number): NonRepeatedTrackSizingFunction[] {
  const out: NonRepeatedTrackSizingFunction[] = [];
  const n = rng.int(min, max);
  for (let i = 0; i < n; i++) out.push(randomTrack(rng));
  return out;
}

function randomTemplate(rng: Rng): TrackSizingFunction[] {
  const out: TrackSizingFunction[] = [];
  const n = rng.int(0, 4);
  for (let i = 0; i < n; i++) {
    switch (rng.int(0, 3)) {
      case 0:
        out.push(repeat(rng.int(1, 3), randomTracks(rng, 0, 2)));
        break;
      case 1:
        out.push(repeat(rng.pick([AUTO_FILL, AUTO_FIT]), randomTracks(rng, 1, 3)));
        break;
      default:
        out.push(randomTrack(rng));
    }
  }
  return out;
}

function assertTrackListShape(tracks: readonly GridTrack[], expectedLength: number): void {
  assert.equal(tracks.length, expectedLength);
  for (const boundary of [tracks[0], tracks[tracks.length - 1]]) {
    if (!boundary) throw new Error("track list has no boundary gutter");
    assert.equal(boundary.kind, "gutter");
    assert.equal(boundary.isCollapsed, true);
    assert.equal(boundary.minTrackSizingFunction, ZERO_LENGTH);
    assert.equal(boundary.maxTrackSizingFunction, ZERO_LENGTH);
  }
  for (let k = 1; k < tracks.length - 1; k++) {
    assert.equal(tracks[k]?.kind, k % 2 === 1 ? "track" : "gutter", `entry ${k}`);
  }
}

describe("grid track generation (seeded)", () => {
  for (const seed of SEEDS) {
    test(`track lists keep their shape (seed ${seed})`, () => {
      const rng = createRng(seed);
      const buffer: GridTrack[] = [];

      for (let iter = 0; iter < ITERATIONS; iter++) {
        const template = randomTemplate(rng);
        const width = rng.int(0, 400);
        const definite = rng.int(0, 2) > 0;
        const style = createGridContainerStyle({
          size: axisPair(definite ? lengthValue(width) : AUTO_VALUE, AUTO_VALUE),
          minSize: axisPair(definite ? AUTO_VALUE : lengthValue(width), AUTO_VALUE),
          gap: axisPair(lengthValue(rng.int(0, 8)), ZERO_LENGTH),
          gridTemplateColumns: template,
        });
        const inner = rng.int(0, 4) === 0 ? null : width;

        const explicit = computeExplicitGridSizeInAxis(
          style,
          template,
          inner,
          noCalc,
          "horizontal",
        );
        const inspection = inspectTrackTemplate(template);
        if (inspection.issue !== null) {
          assert.equal(explicit, 0);
        } else if (inspection.autoRepetition === null) {
          assert.equal(explicit, inspection.fixedTrackCount);
        } else {
          const repeated = inspection.autoRepetition.tracks.length;
          const generated = explicit - inspection.fixedTrackCount;
          assert.ok(generated >= repeated, "auto repetition appears at least once");
          assert.equal(generated % repeated, 0);
        }

        const counts = createTrackCounts(rng.int(0, 3), explicit, rng.int(0, 3));
        const occupancy = new Map<number, boolean>();
        initializeGridTracks(buffer, counts, template, [], style.gap.width, (i) => {
          const has = rng.int(0, 1) === 1;
          occupancy.set(i, has);
          return has;
        });

        assertTrackListShape(buffer, gridTrackListLength(counts));

        const hasAutoFit =
          inspection.autoRepetition !== null &&
          inspection.autoRepetition.repetition.kind === "auto-fit" &&
          explicit > 0;
        if (!hasAutoFit) assert.equal(occupancy.size, 0);

        for (let k = 1; k < buffer.length - 1; k += 2) {
          const track = buffer[k];
          if (!track) throw new Error(`missing entry ${k}`);
          const trackIndex = (k - 1) / 2;
          const collapsed = occupancy.get(trackIndex) === false;
          assert.equal(track.isCollapsed, collapsed, `track ${trackIndex}`);
          assert.equal(buffer[k + 1]?.isCollapsed, collapsed || k + 1 === buffer.length - 1);
        }
      }
    });
  }
});
