export type MarketplaceSubstitutions = {
  MARKETPLACE_URL: string;
  MARKETPLACE_DASHBOARD_URL: string;
  MARKETPLACE_IMPORTS_URL: string;
  MARKETPLACE_CREATE_STORE_URL: string;
  MARKETPLACE_LOGIN_URL: string;
};

/**
 * Marketplace pages referenced from user-facing message templates, keyed by
 * their `[NAME]` placeholder.
 */
export function marketplaceSubstitutions(config: {
  marketplaceUrl: string;
}): MarketplaceSubstitutions {
  const base = config.marketplaceUrl.replace(/\/+$/, "");
  return {
    MARKETPLACE_URL: `${base}/`,
    MARKETPLACE_DASHBOARD_URL: `${base}/merchants/store/dashboard`,
    MARKETPLACE_IMPORTS_URL: `${base}/merchants/store/imports`,
    MARKETPLACE_CREATE_STORE_URL: `${base}/create_store`,
    MARKETPLACE_LOGIN_URL: `${base}/signin`,
  };
}

/**
 * Replace `[NAME]` placeholders in a message; unknown names are left as is
 */
export function applySubstitutions(
  template: string,
  substitutions: MarketplaceSubstitutions
): string {
  return template.replace(/\[([A-Z_]+)\]/g, (match: string, name: string) =>
    isSubstitutionKey(name, substitutions) ? substitutions[name] : match
  );
}

function isSubstitutionKey(
  name: string,
  substitutions: MarketplaceSubstitutions
): name is keyof MarketplaceSubstitutions {
  return Object.prototype.hasOwnProperty.call(substitutions, name);
}
