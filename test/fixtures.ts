import { Columnar } from "../src/columnar";
import { field, Kinds, schema, table } from "../src/index";

// ---------------------------------------------------------------------------
// SCHEMAS
// ---------------------------------------------------------------------------

export const Person = schema("person", {
  surname: Kinds.string,
  dob: field(Kinds.date, "birthday"),
});

export const Student = schema(
  "student",
  {
    level: field(Kinds.integer, "class"),
    score: Kinds.float,
    school: Kinds.integer,
    updated: Kinds.timestamp,
  },
  [Person]
);

export const School = schema("school", {
  sid: field(Kinds.integer, "id"),
  name: Kinds.string,
});

export const student = table(Student);
export const school = table(School);

// ---------------------------------------------------------------------------
// DATA
// ---------------------------------------------------------------------------

const day = (year: number, month: number, date: number): Date =>
  new Date(Date.UTC(year, month - 1, date));

/**
 * Five students across three schools; school 4 has nobody.
 */
export const students = Columnar.fromRecord({
  surname: ["Smith", "Brown", "Jones", "Smith", "Green"],
  birthday: [day(2001, 3, 4), day(2002, 5, 6), day(2001, 7, 8), day(2003, 1, 2), day(2002, 9, 10)],
  class: [1, 2, 1, 3, 2],
  score: [1.5, 0.5, 3.0, 1.0, 1.75],
  school: [1, 1, 2, 2, 3],
  updated: [day(2020, 1, 1), day(2020, 1, 2), day(2020, 1, 3), day(2020, 1, 4), day(2020, 1, 5)],
});

export const schools = Columnar.fromRecord({
  id: [1, 2, 3, 4],
  name: ["Alpha", "Beta", "Gamma", "Delta"],
});
