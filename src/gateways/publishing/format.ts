// Caption formatting for social platforms

const SECTION_LABELS = /\b(?:Hook|Story|Urgency|CTA|Hashtags):[ \t]*/gi;

// Strip section labels and markdown emphasis; emoji are kept as-is
export const formatForPlatform = (text: string): string =>
  text
    .replace(SECTION_LABELS, '')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .trim();

// Append hashtags the body does not already contain
export const composePostBody = (body: string, hashtags: string[]): string => {
  const missing = hashtags
    .map(tag => tag.trim())
    .filter(Boolean)
    .map(tag => (tag.startsWith('#') ? tag : `#${tag}`))
    .filter(tag => !body.includes(tag));

  return missing.length > 0 ? `${body.trim()}\n\n${missing.join(' ')}` : body.trim();
};
