export type SettingSource = "override" | "database" | "environment" | "default" | "unset";

export type SettingCategory =
  | "Core"
  | "Conversion"
  | "Extraction"
  | "Delivery"
  | "OAuth"
  | "Destination"
  | "Notifications";

export interface SettingDefinition {
  key: string;
  env: string;
  default: string | null;
  sensitive: boolean;
  category: SettingCategory;
  description: string;
}

/** A row of the settings table. Sensitive values only ever live in `ciphertext`. */
export interface StoredSetting {
  key: string;
  value: string | null;
  ciphertext: string | null;
  sensitive: boolean;
  updatedAt: Date;
}

export interface ResolvedSetting {
  key: string;
  value: string | null;
  source: SettingSource;
  sensitive: boolean;
}

export interface SettingDiagnostic extends ResolvedSetting {
  category: SettingCategory;
  description: string;
}
