import { expect } from "chai";
import { field, GrammarError, Kinds, schema, table } from "../src/index";
import { Person, Student } from "./fixtures";

describe("Schema", () => {
  it("should place base fields first and apply renames", () => {
    expect(Student.fields.map((f) => f.name)).to.deep.equal([
      "surname",
      "birthday",
      "class",
      "score",
      "school",
      "updated",
    ]);
    expect(Student.attributes).to.deep.equal([
      "surname",
      "dob",
      "level",
      "score",
      "school",
      "updated",
    ]);
  });

  it("should look fields up by attribute or by name", () => {
    expect(Student.get("level").name).to.equal("class");
    expect(Student.get("class").kind).to.equal(Kinds.integer);
    expect(Student.has("dob")).to.equal(true);
    expect(Student.has("age")).to.equal(false);
    expect(() => Student.get("age")).to.throw(GrammarError, "Unknown field age in schema student");
  });

  it("should be equal regardless of the schema name", () => {
    const left = schema("left", { x: Kinds.integer, y: Kinds.string });
    const right = schema("right", { x: Kinds.integer, y: Kinds.string });
    expect(left.equals(right)).to.equal(true);
    expect(left.hash).to.equal(right.hash);
    expect(table(left).equals(table(right))).to.equal(true);
  });

  it("should distinguish field order, names and kinds", () => {
    const base = schema("a", { x: Kinds.integer, y: Kinds.string });
    expect(base.equals(schema("b", { y: Kinds.string, x: Kinds.integer }))).to.equal(false);
    expect(base.equals(schema("c", { x: Kinds.integer, z: Kinds.string }))).to.equal(false);
    expect(base.equals(schema("d", { x: Kinds.float, y: Kinds.string }))).to.equal(false);
  });

  it("should replace an inherited attribute in place", () => {
    const Renamed = schema("renamed", { surname: field(Kinds.string, "lastname") }, [Person]);
    expect(Renamed.fields.map((f) => f.name)).to.deep.equal(["lastname", "birthday"]);
  });

  it("should accept a field shared by several bases", () => {
    const Left = schema("left", { key: Kinds.integer, a: Kinds.string });
    const Right = schema("right", { key: Kinds.integer, b: Kinds.string });
    const Both = schema("both", {}, [Left, Right]);
    expect(Both.fields.map((f) => f.name)).to.deep.equal(["key", "a", "b"]);
  });

  it("should reject colliding bases", () => {
    const Left = schema("left", { key: Kinds.integer });
    const Right = schema("right", { key: Kinds.string });
    expect(() => schema("both", {}, [Left, Right])).to.throw(
      GrammarError,
      "Colliding base classes in schema both"
    );
  });

  it("should reject colliding field names", () => {
    expect(() => schema("x", { a: field(Kinds.integer, "b"), b: Kinds.string })).to.throw(
      GrammarError,
      "Colliding field name b in schema x"
    );
  });
});
