// Plain object export: vitest reads this at runtime, tsc only needs to parse it.
export default {
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
};
