const USER_PLACEHOLDER = '{user}';
const MAX_LABEL_LENGTH = 63;

/**
 * Reduces an identity subject to a DNS-1123 label usable in workload and namespace
 * names: the local part of an email, lower-cased, with everything outside
 * `[a-z0-9-]` collapsed to single dashes.
 */
export const toWorkloadUser = (subject: string): string | null => {
  const localPart = subject.split('@', 1)[0] ?? '';
  const label = localPart
    .toLowerCase()
    .replace(/[^a-z0-9-]+/gu, '-')
    .replace(/-{2,}/gu, '-')
    .replace(/^-+|-+$/gu, '')
    .slice(0, MAX_LABEL_LENGTH)
    .replace(/-+$/u, '');

  return label.length > 0 ? label : null;
};

export const renderNameTemplate = (template: string, user: string) => {
  if (!template.includes(USER_PLACEHOLDER)) {
    throw new Error(`Name template ${JSON.stringify(template)} must contain ${USER_PLACEHOLDER}`);
  }

  return template.split(USER_PLACEHOLDER).join(user);
};
