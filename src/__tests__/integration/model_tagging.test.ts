import { describe, expect, it } from "vitest";
import {
  ENTITY_KIND,
  Material,
  Model,
  Pattern,
  TAG_ERROR,
  TimeSeries,
  is_tag_error,
  type MaterialRegistry,
  type PatternRegistry,
  type TimeSeriesRegistry,
} from "../../index";

class Steel extends Material {
  constructor(registry: MaterialRegistry, user_name: string) {
    super(registry, "uniaxialMaterial", "Steel01", user_name);
  }
}

class PathSeries extends TimeSeries {
  constructor(registry: TimeSeriesRegistry) {
    super(registry, "Path");
  }
}

/** A load pattern driven by a time series it holds by reference. */
class UniformExcitation extends Pattern {
  constructor(
    registry: PatternRegistry,
    readonly series: TimeSeries,
  ) {
    super(registry, "UniformExcitation");
  }

  to_line(): string {
    return `pattern UniformExcitation ${this.tag} 1 -accel ${this.series.tag}`;
  }
}

describe("Model tagging through the public entry point", () => {
  it("three new materials get 1, 2, 3", () => {
    const model = new Model();
    const tags = ["a", "b", "c"].map((name) => new Steel(model.materials, name).tag);

    expect(tags).toEqual([1, 2, 3]);
  });

  it("set_start(100) then two materials get 100, 101", () => {
    const model = new Model();
    model.materials.set_start(100);

    expect(new Steel(model.materials, "a").tag).toBe(100);
    expect(new Steel(model.materials, "b").tag).toBe(101);
  });

  it("exported references follow renumbering of the referenced kind", () => {
    const model = new Model();
    const ground = new PathSeries(model.time_series);
    const wind = new PathSeries(model.time_series);
    const quake = new UniformExcitation(model.patterns, wind);

    expect(quake.to_line()).toBe("pattern UniformExcitation 1 1 -accel 2");

    ground.delete();
    expect(quake.to_line()).toBe("pattern UniformExcitation 1 1 -accel 1");

    model.time_series.set_start(500);
    expect(quake.to_line()).toBe("pattern UniformExcitation 1 1 -accel 500");
  });

  it("errors surface as tag errors with a category", () => {
    const model = new Model();
    new Steel(model.materials, "a");

    let caught: unknown;
    try {
      model.materials.remove(9);
    } catch (error) {
      caught = error;
    }

    expect(is_tag_error(caught) && caught.category).toBe(TAG_ERROR.TAG_NOT_FOUND);
    expect(model.tag_table()[ENTITY_KIND.MATERIAL]).toEqual([
      { tag: 1, creation_order: 0 },
    ]);
  });
});
