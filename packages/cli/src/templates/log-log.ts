export const logLogTemplate = `version: "0.1"
picture:
  axes:
    - xmode: log
      ymode: log
      keys:
        - "grid=major"
      content:
        - "\\\\addplot coordinates {(1,1) (10,100) (100,10000)};"
`;
