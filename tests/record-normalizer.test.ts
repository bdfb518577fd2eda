import { describe, expect, it } from "vitest";
import {
  normalizeAbsences,
  normalizeElementList,
  normalizeExams,
  normalizeHomework,
  normalizeMasterData,
  normalizeMessages,
  normalizeSchoolSearch,
  normalizeSchoolYear,
  normalizeUserData,
  stripHtml,
} from "../src/record-normalizer.js";
import { ElementType } from "../src/types.js";

describe("stripHtml", () => {
  it("keeps line breaks and drops markup", () => {
    expect(stripHtml("<p>No school<br>on Friday &amp; Monday</p>")).toBe(
      "No school\non Friday & Monday",
    );
    expect(stripHtml("  plain  ")).toBe("plain");
  });
});

describe("normalizeElementList", () => {
  it("reads bare lists and wrapped ones, dropping records without an id", () => {
    const rooms = normalizeElementList(
      { rooms: [{ id: 9, name: "R101", longName: "Room 101" }, { name: "nameless" }, "junk"] },
      ElementType.ROOM,
    );
    expect(rooms).toEqual([
      {
        type: ElementType.ROOM,
        id: 9,
        name: "R101",
        longName: "Room 101",
        alternateName: undefined,
        foreColor: undefined,
        backColor: undefined,
        active: true,
      },
    ]);
  });

  it("builds teacher names from first and last name", () => {
    const [teacher] = normalizeElementList(
      [{ id: "7", foreName: "Ada", lastName: "Smith", active: false }],
      ElementType.TEACHER,
    );
    expect(teacher).toMatchObject({ id: 7, name: "Smith", longName: "Ada Smith", active: false });
  });
});

describe("normalizeMasterData", () => {
  it("reads time grid days and units", () => {
    const masterData = normalizeMasterData({
      timeStamp: 1700000000000,
      timeGrid: {
        days: [
          {
            day: "MON",
            units: [
              { label: "1", startTime: "T08:00", endTime: "T08:45" },
              { label: "broken" },
            ],
          },
        ],
      },
    });
    expect(masterData.timeStamp).toBe(1700000000000);
    expect(masterData.timeGrid).toEqual([
      { day: 2, units: [{ label: "1", startTime: "08:00", endTime: "08:45" }] },
    ]);
    expect(masterData.klassen).toEqual([]);
  });
});

describe("normalizeUserData", () => {
  it("reads the mobile API user", () => {
    const user = normalizeUserData({
      userData: {
        elemType: "STUDENT",
        elemId: 42,
        displayName: "Jane Doe",
        schoolName: "Example School",
        klasseId: 5,
        rights: ["R_MY_ABSENCES"],
      },
      masterData: { klassen: [{ id: 5, name: "5a" }] },
    });
    expect(user).toMatchObject({
      personType: ElementType.STUDENT,
      personId: 42,
      displayName: "Jane Doe",
      schoolName: "Example School",
      klasseId: 5,
      rights: ["R_MY_ABSENCES"],
    });
    expect(user.masterData?.klassen.map((klasse) => klasse.name)).toEqual(["5a"]);
  });

  it("falls back to empty values for an unknown shape", () => {
    expect(normalizeUserData("nope")).toEqual({
      masterId: null,
      personType: null,
      personId: null,
      displayName: "",
      schoolName: "",
      departmentId: 0,
      klasseId: null,
      rights: [],
      masterData: null,
    });
  });
});

describe("normalizeMessages", () => {
  it("strips HTML and drops empty messages", () => {
    const messages = normalizeMessages({
      messages: [
        { id: 3, subject: "Trip", text: "<b>Bring</b> lunch", isImportant: true },
        { id: 4 },
      ],
    });
    expect(messages).toEqual([
      {
        id: 3,
        subject: "Trip",
        text: "Bring lunch",
        isExpired: false,
        isImportant: true,
        attachments: [],
      },
    ]);
  });
});

describe("normalizeExams", () => {
  it("reads compact dates and times, dropping exams without a date", () => {
    const exams = normalizeExams({
      exams: [
        {
          id: 11,
          examDate: 20250312,
          startTime: 1000,
          endTime: 1130,
          subject: "Mathematics",
          teachers: ["SMI"],
          rooms: [{ name: "R101" }],
        },
        { id: 12, name: "Undated" },
      ],
    });
    expect(exams).toHaveLength(1);
    expect(exams[0]).toMatchObject({
      id: 11,
      name: "Mathematics",
      subject: "Mathematics",
      startDateTime: new Date(2025, 2, 12, 10, 0),
      endDateTime: new Date(2025, 2, 12, 11, 30),
      teachers: ["SMI"],
      rooms: ["R101"],
      classes: [],
    });
  });
});

describe("normalizeHomework", () => {
  it("takes the subject from the lesson list", () => {
    const homework = normalizeHomework({
      homeWorks: [
        { id: 1, lessonId: 10, startDate: 20250310, endDate: 20250317, text: "Page 12" },
        { id: 2, text: "no date" },
      ],
      lessons: [{ id: 10, subject: "Mathematics" }],
    });
    expect(homework).toEqual([
      {
        id: 1,
        lessonId: 10,
        subject: "Mathematics",
        text: "Page 12",
        remark: undefined,
        date: new Date(2025, 2, 10),
        dueDate: new Date(2025, 2, 17),
        completed: false,
      },
    ]);
  });
});

describe("normalizeAbsences", () => {
  it("reads date-times and the class name", () => {
    const [absence] = normalizeAbsences({
      absences: [
        {
          id: 5,
          startDateTime: "2025-03-10T08:00",
          endDateTime: "2025-03-10T12:00",
          reason: "Ill",
          klasse: { name: "5a" },
          isExcused: "true",
        },
      ],
    });
    expect(absence).toEqual({
      id: 5,
      startDateTime: new Date(2025, 2, 10, 8, 0),
      endDateTime: new Date(2025, 2, 10, 12, 0),
      reason: "Ill",
      text: undefined,
      className: "5a",
      isExcused: true,
    });
  });

  it("reads student service absences with a nested duration", () => {
    const [absence] = normalizeAbsences({
      absences: [
        {
          id: 11,
          duration: { start: "2025-03-11T08:00:00", end: "2025-03-11T09:30:00" },
          excuseStatus: { id: 1, name: "Excused by parent", type: "EXCUSED" },
          excuseText: "Doctor",
        },
      ],
    });
    expect(absence).toEqual({
      id: 11,
      startDateTime: new Date(2025, 2, 11, 8, 0),
      endDateTime: new Date(2025, 2, 11, 9, 30),
      reason: "Excused by parent",
      text: "Doctor",
      className: undefined,
      isExcused: true,
    });
  });
});

describe("normalizeSchoolYear", () => {
  it("reads a single record or the first of a list", () => {
    const expected = {
      id: 3,
      name: "2024/2025",
      startDate: new Date(2024, 8, 2),
      endDate: new Date(2025, 6, 25),
    };
    const record = { id: 3, name: "2024/2025", startDate: 20240902, endDate: 20250725 };
    expect(normalizeSchoolYear(record)).toEqual(expected);
    expect(normalizeSchoolYear([record])).toEqual(expected);
    expect(normalizeSchoolYear({})).toBeNull();
  });
});

describe("normalizeSchoolSearch", () => {
  it("derives the server URL when it is missing", () => {
    expect(
      normalizeSchoolSearch({
        schools: [
          { schoolId: 77, loginName: "example-school", displayName: "Example School", server: "demo.webuntis.com" },
        ],
      }),
    ).toEqual([
      {
        schoolId: 77,
        loginName: "example-school",
        displayName: "Example School",
        server: "demo.webuntis.com",
        serverUrl: "https://demo.webuntis.com",
        address: undefined,
      },
    ]);
  });
});
