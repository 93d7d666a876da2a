export const BRAG_TEXT = `# Ada Lovelace <ada@example.com>

## Goals

- [O] Learn the loom

## 2026-02-23

- [X] Plan sprint

## 2026-03-02

- [ ] Fix parser

------------------------------------------------------------

# Grace

## 2026-03-02

- [X] Write compiler
`;
