import type { ArticleOrganization } from '../../shared/articles';

export const DEFAULT_UTM_PLACEMENT = 'additional_box';

export interface UtmParamsInput {
  boosted: boolean;
  organization?: ArticleOrganization | null;
  placement?: string;
}

export const buildInternalUtmParams = ({
  boosted,
  organization,
  placement = DEFAULT_UTM_PLACEMENT,
}: UtmParamsInput): string => {
  const boosterOrg = organization?.slug ?? '';
  const campaign = boosted ? `${boosterOrg}_boosted` : 'regular';
  return `?utm_source=${placement}&utm_medium=internal&utm_campaign=${campaign}&booster_org=${boosterOrg}`;
};
