import { META_DESCRIPTION_LENGTH, TITLE_LENGTH } from "./scoring";
import type { PostContent, SeoFieldAudit } from "./types";

export function auditSeoFields(post: PostContent): SeoFieldAudit {
  const errors: string[] = [];
  const warnings: string[] = [];
  const metaTitle = post.metaTitle.trim();
  const metaDescription = post.metaDescription.trim();

  if (!post.primaryKeyword.trim()) errors.push("Primary keyword is required");

  if (!metaTitle) errors.push("Meta title is required");
  else if (metaTitle.length > TITLE_LENGTH.max) {
    warnings.push(`Meta title should be ${TITLE_LENGTH.max} characters or less (currently ${metaTitle.length})`);
  }

  if (!metaDescription) errors.push("Meta description is required");
  else if (metaDescription.length > META_DESCRIPTION_LENGTH.max) {
    warnings.push(
      `Meta description should be ${META_DESCRIPTION_LENGTH.max} characters or less (currently ${metaDescription.length})`
    );
  }

  if (!post.ogTitle.trim()) warnings.push("OG title is recommended for social sharing");
  if (!post.ogDescription.trim()) warnings.push("OG description is recommended for social sharing");
  if (!post.ogImage.trim()) warnings.push("OG image is recommended for social sharing");

  const missingAlt = post.images.filter((img) => img.url.trim() && !img.altText.trim()).length;
  if (missingAlt) warnings.push(`${missingAlt} image(s) are missing alt text`);

  const canonical = post.canonicalUrl.trim();
  if (canonical && !/^https?:\/\/\S+$/i.test(canonical)) {
    warnings.push("Canonical URL should be an absolute http(s) URL");
  }

  return { errors, warnings };
}
