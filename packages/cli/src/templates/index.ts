import { badgeTemplate } from "./badge.js";
import { basicTemplate } from "./basic.js";

export const templates: Record<string, string> = {
  basic: basicTemplate,
  badge: badgeTemplate,
};
