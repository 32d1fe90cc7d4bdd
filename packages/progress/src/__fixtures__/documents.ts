import { createChapter as chapter, type CurriculumDocument } from "@coursetrack/course-core";

export const introLoopsDocument: CurriculumDocument = {
  unitId: "T100",
  unitName: "Test Unit",
  learningOutcomesOverall: [],
  chapters: [
    chapter({ chapterId: "ch1", order: 1, title: "Intro", weekLabel: "Week 1" }),
    chapter({ chapterId: "ch2", order: 2, title: "Loops", weekLabel: "Week 2", prerequisites: ["ch1"] }),
  ],
};

export const emptyDocument: CurriculumDocument = {
  learningOutcomesOverall: [],
  chapters: [],
};
