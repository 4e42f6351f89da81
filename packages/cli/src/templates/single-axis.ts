export const singleAxisTemplate = `version: "0.1"
picture:
  keys:
    - baseline
  axes:
    - keys:
        - "width=8cm"
        - "xlabel={$x$}"
        - "ylabel={$y$}"
      content:
        - "\\\\addplot coordinates {(0,0) (1,1) (2,4) (3,9)};"
`;
