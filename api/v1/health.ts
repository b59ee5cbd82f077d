// api/v1/health.ts - liveness plus a check that the lexicons load
import { success } from '../_lib/http';
import { withRequest } from '../_lib/logger';
import { getDefaultRiskConfig } from '../_lib/services/riskConfig';
import { withErrorHandling, withMethods } from '../_lib/wrappers';

export default withErrorHandling(withMethods(['GET'], (req, res) => {
  res.setHeader('Cache-Control', 'no-store');

  const config = getDefaultRiskConfig();
  const lexicons = {
    riskKeywords: config.riskKeywords.length,
    dismissivePatterns: config.dismissivePatterns.length,
    leadershipRoles: config.leadershipRoles.size,
    sentimentWords: config.sentimentLexicon.valences.size,
  };

  withRequest(req, res).debug('Health check', lexicons);

  success(res, {
    status: 'healthy',
    service: 'buried-risk-api',
    uptime: process.uptime(),
    node_version: process.version,
    lexicons,
  }, 200, req);
}));
