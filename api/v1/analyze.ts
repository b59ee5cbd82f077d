// api/v1/analyze.ts
import { success } from '../_lib/http';
import { withRequest } from '../_lib/logger';
import { analyzeRequestSchema } from '../_lib/schemas/analysisRequest';
import { createRiskConfig, getDefaultRiskConfig } from '../_lib/services/riskConfig';
import { RiskPipeline } from '../_lib/services/riskPipeline';
import { withErrorHandling, withMethods, withValidation } from '../_lib/wrappers';

export const analyzeHandler = withValidation(analyzeRequestSchema, (req, res, body) => {
  const log = withRequest(req, res, { route: 'analyze' });
  const config = body.config ? createRiskConfig(body.config) : getDefaultRiskConfig();

  const analysis = new RiskPipeline(config, log).run(body.messages);

  log.info('Transcript analyzed', {
    messages: analysis.stats.totalMessages,
    flagged: analysis.stats.flaggedCount,
    clusters: analysis.stats.clusterCount,
    gaps: analysis.stats.communicationGapCount,
    severity: analysis.stats.severity.level,
    customConfig: Boolean(body.config),
  });

  success(res, analysis, 200, req);
});

export default withErrorHandling(withMethods(['POST'], analyzeHandler));
