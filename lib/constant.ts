export const ID_SIZE = 4; // uint32
export const COLUMN_USERNAME_SIZE = 32;
export const COLUMN_EMAIL_SIZE = 255;

export const ID_OFFSET = 0;
export const USERNAME_OFFSET = ID_OFFSET + ID_SIZE;
export const EMAIL_OFFSET = USERNAME_OFFSET + COLUMN_USERNAME_SIZE;
// 4 + 32 + 255 = 291
export const ROW_SIZE = ID_SIZE + COLUMN_USERNAME_SIZE + COLUMN_EMAIL_SIZE;

export const PAGE_SIZE = 4096;
export const TABLE_MAX_PAGES = 100;
export const ROWS_PER_PAGE = Math.floor(PAGE_SIZE / ROW_SIZE); // 14
export const TABLE_MAX_ROWS = ROWS_PER_PAGE * TABLE_MAX_PAGES;

export const MAX_ROW_ID = 0xffffffff;
