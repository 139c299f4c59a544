export type OutputFormat = "json" | "html";

export interface Config {
  kinds: {
    extra_labels: Map<number, string>;
  };
  verify_signatures: boolean;
  render: {
    summary_max_length: number;
  };
  output: {
    format: OutputFormat;
  };
}

export interface ProfileMetadata {
  name?: string;
  display_name?: string;
  about?: string;
  picture?: string;
  banner?: string;
  nip05?: string;
  website?: string;
}

export interface ClientLink {
  name: string;
  url: string;
}

export type PreviewStyle =
  | "telegram"
  | "twitter"
  | "mattermost"
  | "slack"
  | "discord"
  | "whatsapp"
  | ""
  | "unknown";

export type RequestHeaders = Headers | Record<string, string | string[] | undefined>;

export interface Preview {
  code: string;
  style: PreviewStyle;
  kind: number;
  kindLabel: string;
  title: string;
  description: string;
  image?: string;
  content: string;
  clients: ClientLink[];
}
