import { expect } from "chai";
import { sql } from "drizzle-orm";
import {
  count,
  DrizzleParser,
  Kinds,
  literal,
  sum,
  toQuery,
  UnsupportedError,
} from "../src/index";
import { school, student } from "./fixtures";

// ---------------------------------------------------------------------------
// TEST FIXTURES
// ---------------------------------------------------------------------------

const score = student.get("score");
const level = student.get("level");
const surname = student.get("surname");
const condition = school.get("sid").eq(student.get("school"));

describe("DrizzleParser", () => {
  it("should compile a grouped join with bound parameters", () => {
    const query = student
      .join(school, condition)
      .select(surname.alias("student"), count(school.get("name")).alias("num"))
      .groupby(surname)
      .having(count(school.get("name")).gt(1))
      .where(score.lt(2))
      .orderby(level, score, "desc")
      .limit(10);
    expect(toQuery(new DrizzleParser().compile(query))).to.deep.equal({
      sql:
        'SELECT "student"."surname" AS "student", count("school"."name") AS "num" ' +
        'FROM "student" JOIN "school" ON "school"."id" = "student"."school" ' +
        'WHERE "student"."score" < ? GROUP BY "student"."surname" ' +
        'HAVING count("school"."name") > ? ' +
        'ORDER BY "student"."class" ASC, "student"."score" DESC LIMIT 10',
      params: [2, 1],
    });
  });

  it("should compile a reference to a subquery", () => {
    const foo = student.reference("foo");
    const bar = foo
      .join(school, school.get("sid").eq(foo.get("school")))
      .select(foo.get("surname").alias("student"), school.get("name").alias("school"))
      .reference("bar");
    const { sql: text, params } = toQuery(new DrizzleParser().compile(bar.select(bar.get("student"))));
    expect(text).to.equal(
      'SELECT "bar"."student" FROM (SELECT "foo"."surname" AS "student", ' +
        '"school"."name" AS "school" FROM "student" AS "foo" ' +
        'JOIN "school" ON "school"."id" = "foo"."school") AS "bar"'
    );
    expect(params).to.deep.equal([]);
  });

  it("should render plain outer join keywords", () => {
    expect(toQuery(new DrizzleParser().compile(student.leftJoin(school, condition)))).to.deep.equal({
      sql: '"student" LEFT JOIN "school" ON "school"."id" = "student"."school"',
      params: [],
    });
  });

  it("should use provisioned source fragments", () => {
    const parser = new DrizzleParser({ sources: [[student, sql`${sql.identifier("pupils")}`]] });
    const { sql: text } = toQuery(parser.compile(student.select(surname)));
    expect(text).to.equal('SELECT "pupils"."surname" FROM "pupils"');
  });

  it("should bind literal values as parameters", () => {
    const cutoff = new Date(Date.UTC(2000, 0, 1));
    const query = student
      .select(surname)
      .where(student.get("dob").lt(literal(cutoff, Kinds.date)).and(surname.ne("O'Brien")));
    expect(toQuery(new DrizzleParser().compile(query))).to.deep.equal({
      sql:
        'SELECT "student"."surname" FROM "student" ' +
        'WHERE ("student"."birthday" < ?) AND ("student"."surname" != ?)',
      params: [cutoff, "O'Brien"],
    });
  });

  it("should parenthesize nested expressions", () => {
    const parser = new DrizzleParser();
    const fragment = parser.compileFeature(literal(1).add(literal(2)).mul(3));
    expect(toQuery(fragment)).to.deep.equal({ sql: "(? + ?) * ?", params: [1, 2, 3] });
  });

  it("should render windows", () => {
    const window = sum(score).over([student.get("school")], [student.get("updated")], {
      mode: "rows",
      start: -2,
      end: "current",
    });
    const { sql: text } = toQuery(new DrizzleParser().compileFeature(window));
    expect(text).to.equal(
      'sum("student"."score") OVER (PARTITION BY "student"."school" ' +
        'ORDER BY "student"."updated" ASC ROWS BETWEEN 2 PRECEDING AND CURRENT ROW)'
    );
  });

  it("should render array literals element by element", () => {
    const { sql: text, params } = toQuery(new DrizzleParser().compileFeature(literal([4, 5])));
    expect(text).to.equal("ARRAY[?, ?]");
    expect(params).to.deep.equal([4, 5]);
  });

  it("should reject literals without an encoding", () => {
    expect(() => new DrizzleParser().compileFeature(literal({ a: 1, b: "x" }))).to.throw(
      UnsupportedError,
      "Unsupported literal kind: Struct(a: Integer, b: String)"
    );
  });
});
