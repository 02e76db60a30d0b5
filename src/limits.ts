/** Maximum number of file attachments on a single webhook message. */
export const MAX_FILES = 20;

/** Maximum characters in a message's text content. */
export const MAX_CONTENT_LENGTH = 2000;

/** Maximum embeds on a single webhook message. */
export const MAX_EMBEDS = 10;
