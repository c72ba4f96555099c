export type Env = {
  MAPPING_BASE_URL: string;
  REMAP_CONTACT_EMAIL?: string;
  MONGO_URI?: string;
};

export const defaultMappingBaseUrl = "https://www.uniprot.org/uploadlists/";

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optional = (value: string | undefined): string | undefined => {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MAPPING_BASE_URL = validateHttpUrl("MAPPING_BASE_URL", optional(env.MAPPING_BASE_URL) ?? defaultMappingBaseUrl);
  const loaded: Env = { MAPPING_BASE_URL };

  const contactEmail = optional(env.REMAP_CONTACT_EMAIL);
  if (contactEmail) loaded.REMAP_CONTACT_EMAIL = contactEmail;

  const mongoUri = optional(env.MONGO_URI);
  if (mongoUri) loaded.MONGO_URI = mongoUri;

  return loaded;
};
