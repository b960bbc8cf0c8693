import { describe, expect, it } from "vitest";
import { Model } from "../../model/model";
import { ENTITY_KIND } from "../kind";
import { Material, type MaterialRegistry } from "../material";
import { Section, type SectionRegistry } from "../section";
import type { EntityRef } from "../../tag/tag_registry";

class ElasticMaterial extends Material {
  constructor(registry: MaterialRegistry, user_name: string) {
    super(registry, "uniaxialMaterial", "Elastic", user_name);
  }
}

/**
 * Holds its material by reference, so the exported tag follows renumbering.
 * The reference is resolved before super() so a bad one registers nothing.
 */
class UniaxialSection extends Section {
  readonly material: Material;

  constructor(
    registry: SectionRegistry,
    materials: MaterialRegistry,
    user_name: string,
    material: EntityRef<Material>,
  ) {
    const resolved = materials.resolve(material);
    super(registry, "Uniaxial", "UniaxialSection", user_name);
    this.material = resolved;
  }

  to_line(): string {
    return `section Uniaxial ${this.tag} ${this.material.tag} P`;
  }
}

describe("Section", () => {
  it("resolves its material by name, tag or reference", () => {
    const model = new Model();
    const soft = new ElasticMaterial(model.materials, "soft");
    const stiff = new ElasticMaterial(model.materials, "stiff");

    const by_name = new UniaxialSection(model.sections, model.materials, "s1", "stiff");
    const by_tag = new UniaxialSection(model.sections, model.materials, "s2", 1);
    const by_ref = new UniaxialSection(model.sections, model.materials, "s3", stiff);

    expect(by_name.material).toBe(stiff);
    expect(by_tag.material).toBe(soft);
    expect(by_ref.material).toBe(stiff);
  });

  it("follows its material through renumbering", () => {
    const model = new Model();
    const soft = new ElasticMaterial(model.materials, "soft");
    const stiff = new ElasticMaterial(model.materials, "stiff");
    const section = new UniaxialSection(model.sections, model.materials, "col", stiff);

    expect(section.to_line()).toBe("section Uniaxial 1 2 P");

    soft.delete();
    expect(section.to_line()).toBe("section Uniaxial 1 1 P");

    model.materials.set_start(30);
    model.sections.set_start(7);
    expect(section.to_line()).toBe("section Uniaxial 7 30 P");
  });

  it("throws when the material reference does not resolve", () => {
    const model = new Model();
    new ElasticMaterial(model.materials, "soft");

    expect(
      () => new UniaxialSection(model.sections, model.materials, "a", "missing"),
    ).toThrow("No material named 'missing'");
    expect(
      () => new UniaxialSection(model.sections, model.materials, "b", 2),
    ).toThrow("No material with tag 2");
  });

  it("a failed construction leaves no section behind", () => {
    const model = new Model();
    const soft = new ElasticMaterial(model.materials, "soft");

    expect(
      () => new UniaxialSection(model.sections, model.materials, "a", "missing"),
    ).toThrow("No material named 'missing'");

    expect(model.sections.count).toBe(0);
    expect(model.sections.find_by_name("a")).toBeUndefined();
    expect(model.tag_table()[ENTITY_KIND.SECTION]).toEqual([]);

    const section = new UniaxialSection(model.sections, model.materials, "a", soft);
    expect(section.tag).toBe(1);
    expect(section.creation_order).toBe(0);
  });
});
