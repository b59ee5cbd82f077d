// api/v1/config.ts
import { success } from '../_lib/http';
import { describeRiskConfig, getDefaultRiskConfig } from '../_lib/services/riskConfig';
import { withErrorHandling, withMethods } from '../_lib/wrappers';

export default withErrorHandling(withMethods(['GET'], (req, res) => {
  success(res, describeRiskConfig(getDefaultRiskConfig()), 200, req);
}));
