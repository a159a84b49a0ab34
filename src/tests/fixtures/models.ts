/**
 * Small model catalog for tests
 */

import { parseModelCatalog } from '../../tailoring/selection/modelRegistry';

export const TEST_MODELS = parseModelCatalog({
  models: [
    {
      id: 'embed-small',
      provider: 'openai',
      taskTypes: ['embedding'],
      costPerUnit: 0.00002,
      latencyClass: 'fast',
      qualityTier: 'medium',
      dimensions: 9
    },
    {
      id: 'embed-legacy',
      provider: 'openai',
      taskTypes: ['embedding'],
      costPerUnit: 0.0001,
      qualityTier: 'standard',
      dimensions: 9,
      deprecated: true
    },
    {
      id: 'chat-cheap',
      provider: 'openai',
      taskTypes: ['job_parsing', 'cv_generation'],
      costPerUnit: 0.0001,
      costPerOutputUnit: 0.0002,
      latencyClass: 'fast',
      qualityTier: 'medium',
      maxOutputTokens: 4096
    },
    {
      id: 'chat-best',
      provider: 'anthropic',
      taskTypes: ['job_parsing', 'cv_generation'],
      costPerUnit: 0.003,
      costPerOutputUnit: 0.015,
      latencyClass: 'standard',
      qualityTier: 'high',
      maxOutputTokens: 8192
    }
  ]
}, 'test catalog');
