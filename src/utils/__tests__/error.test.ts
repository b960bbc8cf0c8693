import { describe, expect, it } from "vitest";
import { AppError, is_tag_error, TAG_ERROR, TagError } from "../error";

describe("TagError", () => {
  it("defaults its message to the category", () => {
    const error = new TagError(TAG_ERROR.TAG_NOT_FOUND);

    expect(error.message).toBe("TAG_NOT_FOUND");
    expect(error.name).toBe("TagError");
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
  });

  it("marks caller mistakes as operational", () => {
    expect(new TagError(TAG_ERROR.INVALID_START_TAG).is_operational).toBe(true);
    expect(new TagError(TAG_ERROR.TAG_OVERFLOW).is_operational).toBe(true);
    expect(new TagError(TAG_ERROR.DENSITY_VIOLATION).is_operational).toBe(false);
  });

  it("keeps the context it was given", () => {
    const error = new TagError(TAG_ERROR.NAME_NOT_FOUND, "missing", {
      name: "steel",
    });

    expect(error.message).toBe("missing");
    expect(error.context).toEqual({ name: "steel" });
  });

  it("is_tag_error narrows only tag errors", () => {
    expect(is_tag_error(new TagError(TAG_ERROR.TAG_NOT_FOUND))).toBe(true);
    expect(is_tag_error(new Error("plain"))).toBe(false);
    expect(is_tag_error("TAG_NOT_FOUND")).toBe(false);
  });
});
