import * as cheerio from "cheerio";
import { TextDecoder } from "node:util";
import { encodeProxyLink } from "./link";
import { isRoutableReference, resolveUrl } from "./resolver";

const urlAttributes: Record<string, string[]> = {
  a: ["href"],
  area: ["href"],
  link: ["href"],
  img: ["src", "longdesc"],
  script: ["src"],
  iframe: ["src"],
  form: ["action"],
  video: ["poster"],
  audio: ["src"],
  source: ["src"],
};

const srcsetElements = "img[srcset], source[srcset]";

const cssUrlToken = /url\(([^)]+)\)/gi;
const cssUrlTrim = /^[ \t\n'"]+|[ \t\n'"]+$/g;
const documentMarkup = /<!doctype|<(html|head|body)[\s>]/i;
const metaCharset = /<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i;
const charsetParameter = /;\s*charset\s*=\s*("?)([^;"\s]+)\1/i;

export type RewrittenBody = {
  body: Buffer;
  contentType: string;
};

export const primaryContentType = (contentType: string): string =>
  (contentType.split(";")[0] ?? "").trim().toLowerCase();

export const charsetOf = (contentType: string): string | undefined =>
  charsetParameter.exec(contentType)?.[2]?.toLowerCase();

/** Sets the charset parameter to utf-8, adding it when absent. */
export const withUtf8Charset = (contentType: string): string =>
  charsetParameter.test(contentType)
    ? contentType.replace(charsetParameter, "; charset=utf-8")
    : `${contentType.trim()}; charset=utf-8`;

/** Decodes with the named charset, or as UTF-8 when the label is unknown. */
export const decodeText = (bytes: Buffer, charset = "utf-8"): string => {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
};

// Header charset first, then a <meta> declaration near the top of the page.
const htmlCharsetOf = (body: Buffer, contentType: string): string | undefined =>
  charsetOf(contentType) ??
  metaCharset.exec(body.subarray(0, 1024).toString("latin1"))?.[1]?.toLowerCase();

/** Routes one reference through the proxy; non-routable schemes stay as they are. */
export const proxify = (reference: string, baseUrl: string, scriptPath: string): string => {
  if (!isRoutableReference(reference)) return reference;
  return encodeProxyLink(resolveUrl(reference, baseUrl), scriptPath);
};

/**
 * Rewrites every `url(...)` token. Non-routable targets keep their original
 * token. `decodeReference` turns the raw argument into text when the CSS was
 * read byte for byte.
 */
export const rewriteCssUrls = (
  css: string,
  baseUrl: string,
  scriptPath: string,
  decodeReference: (raw: string) => string = (raw) => raw,
): string =>
  css.replace(cssUrlToken, (match, argument: string) => {
    const reference = decodeReference(argument.replace(cssUrlTrim, ""));
    if (!isRoutableReference(reference)) return match;
    return `url("${proxify(reference, baseUrl, scriptPath)}")`;
  });

export const rewriteSrcset = (srcset: string, baseUrl: string, scriptPath: string): string =>
  srcset
    .split(",")
    .map((candidate) => candidate.trim())
    .filter(Boolean)
    .map((candidate) => {
      const [url = "", descriptor = ""] = candidate.split(/\s+(.*)/s);
      const rewritten = proxify(url, baseUrl, scriptPath);
      return descriptor.trim() ? `${rewritten} ${descriptor.trim()}` : rewritten;
    })
    .join(", ");

export class ContentRewriter {
  constructor(private scriptPath: string) { }

  /**
   * Rewrites a response body for the client. HTML and CSS references are
   * routed back through the proxy; any other content type passes through
   * untouched. A failure while rewriting sends the original body.
   *
   * HTML is decoded with its declared charset and served as UTF-8, so the
   * returned content type may differ from the upstream one. CSS is rewritten
   * byte for byte outside its `url()` tokens and keeps its charset.
   */
  rewrite(body: Buffer, contentType: string, baseUrl: string): RewrittenBody {
    const type = primaryContentType(contentType);

    try {
      if (type === "text/html") {
        const html = decodeText(body, htmlCharsetOf(body, contentType));
        return {
          body: Buffer.from(this.rewriteHtml(html, baseUrl), "utf8"),
          contentType: withUtf8Charset(contentType),
        };
      }

      if (type === "text/css") {
        const charset = charsetOf(contentType);
        // url() syntax is ASCII; latin1 maps every other byte to itself.
        const css = rewriteCssUrls(body.toString("latin1"), baseUrl, this.scriptPath, (raw) =>
          decodeText(Buffer.from(raw, "latin1"), charset),
        );
        return { body: Buffer.from(css, "latin1"), contentType };
      }
    } catch (e) {
      console.error("[ContentRewriter] Error rewriting content:", e);
    }

    return { body, contentType };
  }

  rewriteCss(css: string, baseUrl: string): string {
    return rewriteCssUrls(css, baseUrl, this.scriptPath);
  }

  rewriteHtml(html: string, effectiveUrl: string): string {
    const $ = cheerio.load(html, null, documentMarkup.test(html));

    let baseUrl = effectiveUrl;
    const base = $("base").first();
    const baseHref = base.attr("href");
    if (baseHref !== undefined) {
      baseUrl = resolveUrl(baseHref, effectiveUrl);
      // Proxied links are root-relative; an upstream <base> would re-anchor them.
      base.removeAttr("href");
    }

    for (const [tag, attrs] of Object.entries(urlAttributes)) {
      $(tag).each((_, el) => {
        const $el = $(el);
        for (const attr of attrs) {
          const value = $el.attr(attr);
          if (value !== undefined) {
            $el.attr(attr, proxify(value, baseUrl, this.scriptPath));
          }
        }
      });
    }

    $(srcsetElements).each((_, el) => {
      const $el = $(el);
      const srcset = $el.attr("srcset");
      if (srcset !== undefined) {
        $el.attr("srcset", rewriteSrcset(srcset, baseUrl, this.scriptPath));
      }
    });

    $("style").each((_, el) => {
      const $el = $(el);
      $el.text(this.rewriteCss($el.text(), baseUrl));
    });

    $("meta[charset]").attr("charset", "utf-8");
    $('meta[http-equiv="content-type" i]').attr("content", "text/html; charset=utf-8");

    $("[style]").each((_, el) => {
      const $el = $(el);
      const style = $el.attr("style");
      if (style && style.toLowerCase().includes("url(")) {
        $el.attr("style", this.rewriteCss(style, baseUrl));
      }
    });

    return $.html();
  }
}
