export const QUERIES = {
  VERSION: `SHOW VARIABLES LIKE 'version'`,
  SELECT_WORD: `
    SELECT word
    FROM words
    WHERE word = ?
    LIMIT 1
  `,
  INSERT_WORD: `
    INSERT INTO words (word)
    VALUES (?)
  `,
  UPDATE_WORD: `
    UPDATE words
    SET word = ?
    WHERE word = ?
  `,
  DELETE_WORD: `
    DELETE FROM words
    WHERE word = ?
  `,
} as const;
