// src/test/setup.ts
// Plain output in every suite; debug logging only when a test opts in.
process.env.REPACK_BORING = '1';
delete process.env.REPACK_DEBUG;
