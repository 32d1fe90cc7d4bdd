import { createCourseRuntime } from '../packages/progress/src/index';

(async () => {
  const runtime = createCourseRuntime();
  const { tools } = runtime;
  const session = new Map<string, unknown>();

  const outline = await tools.getCourseOutline();
  if (outline.status === 'error') {
    console.log('Course outline unavailable:', outline.message);
    return;
  }
  console.log('Unit:', outline.unitId, '-', outline.unitName);

  const recorded = await tools.recordStudentProgress(
    { completedChapters: ['Getting Started', 'week 2', 'not a chapter'], note: 'finished the lab early' },
    session
  );
  console.log('Recorded:', recorded);

  console.log('\nRepeating the same chapters in a different case');
  const repeated = await tools.recordStudentProgress({ completedChapters: ['getting started'] }, session);
  console.log('Message:', repeated.message);

  const next = await tools.getNextChapterRecommendation({}, session);
  console.log('\nNext chapter:', next);

  console.log('\nMetrics:', tools.getMetricsSummary().metrics);
  console.log('\nDone');
})();
