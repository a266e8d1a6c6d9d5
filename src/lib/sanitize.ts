import sanitize from 'sanitize-html';

export const ALLOWED_HTML_TAGS = [
  'p', 'br', 'strong', 'em', 'blockquote',
  'h1', 'h2', 'h3',
  'ul', 'ol', 'li',
  'a', 'code', 'pre', 'span', 'img',
  'details', 'summary',
];

export const ALLOWED_HTML_ATTRIBUTES: Record<string, string[]> = {
  '*': ['class', 'id'],
  a: ['href'],
  img: ['src', 'alt'],
  details: ['open'],
};

export type HtmlSanitizer = (html: string) => string;

/**
 * Builds the allow-list sanitizer applied to post bodies before storage.
 * Disallowed tags are dropped but their text is kept, except for
 * script/style whose content goes too. Links must be http(s); image
 * sources must start with one of `trustedImageSources`.
 */
export function createSanitizer(trustedImageSources: string[]): HtmlSanitizer {
  const isTrustedImage = (src: string | undefined): boolean =>
    src !== undefined && trustedImageSources.some((prefix) => src.startsWith(prefix));

  const options: sanitize.IOptions = {
    allowedTags: ALLOWED_HTML_TAGS,
    allowedAttributes: ALLOWED_HTML_ATTRIBUTES,
    allowedSchemes: ['http', 'https'],
    allowedSchemesByTag: { img: ['http', 'https', 'data'] },
    allowProtocolRelative: false,
    transformTags: {
      img: (tagName, attribs) => {
        if (isTrustedImage(attribs.src)) {
          return { tagName, attribs };
        }
        const { src: _untrusted, ...rest } = attribs;
        return { tagName, attribs: rest };
      },
    },
  };

  return (html) => sanitize(html, options);
}
