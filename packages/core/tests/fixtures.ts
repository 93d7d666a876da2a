/** Two users, a goals block, two dated sessions and a separator rule */
export const SAMPLE_DOCUMENT = `Preamble text before the first user is ignored

# Ada Lovelace <ada@example.com>

## My Goals

- [O] Learn the loom -- halfway
- Publish notes

## 2026-03-02

- [X] Ship feature -- shipped today
- [ ] Fix parser

## 2026-02-23

- [X] Plan sprint

------------------------------------------------------------

# Grace

## 2026-03-02

1. [O] Write compiler
`;
