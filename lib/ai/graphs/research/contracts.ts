// Types, stage table and prompts for the product-management deep research pipeline
import type { TokenUsage } from '../../usage.js';

export type PipelineState = {
  query: string;
  research_plan: string;
  market_analysis: string;
  user_insights: string;
  competitive_landscape: string;
  risks_and_challenges: string;
  devils_advocate: string;
  recommendations: string;
  final_report: string;
  current_step: string;
  usage: TokenUsage;
};

// Fields a stage may write
export type StageOutput =
  | 'research_plan'
  | 'market_analysis'
  | 'user_insights'
  | 'competitive_landscape'
  | 'risks_and_challenges'
  | 'devils_advocate'
  | 'recommendations';

export type StageKey =
  | 'plan'
  | 'market_analysis'
  | 'user_insights'
  | 'competitive_analysis'
  | 'risk_assessment'
  | 'devils_advocate'
  | 'synthesize';

export type PipelineStage = {
  key: StageKey;
  title: string;
  output: StageOutput;
  prompt: (state: Readonly<PipelineState>) => string;
};

export type DeepResearchMeta = {
  steps_completed: number;
  model: string;
  mode: 'deep_research';
  usage: TokenUsage;
  error?: string;
};

export type DeepResearchResult = {
  report: string;
  meta: DeepResearchMeta;
};

export type DeepResearchInfo = {
  mode: 'deep_research';
  model: string;
  workflow_steps: number;
  optimized_for: string;
  features: string[];
};

export const REPORT_HEADINGS = [
  '📋 Research Question',
  '📊 Market Analysis',
  '👥 User Insights',
  '⚔️ Competitive Landscape',
  '⚠️ Risks & Challenges',
  "😈 Devil's Advocate: Why This Might Fail",
  '🎯 Strategic Recommendations'
] as const;

export const DEEP_RESEARCH_FEATURES = [
  'Multi-step reasoning',
  'Market analysis',
  'User research',
  'Competitive intelligence',
  'Risk assessment',
  "Devil's Advocate (critical analysis)",
  'Strategic recommendations'
] as const;

export const initialState = (query: string, usage: TokenUsage): PipelineState => ({
  query,
  research_plan: '',
  market_analysis: '',
  user_insights: '',
  competitive_landscape: '',
  risks_and_challenges: '',
  devils_advocate: '',
  recommendations: '',
  final_report: '',
  current_step: 'Initializing',
  usage
});

// Prompt templates, one per stage

export const PROMPT_PLAN = (s: Readonly<PipelineState>) => `You are a senior product manager creating a research plan.

Question: ${s.query}

Break this down into a structured research plan covering:
1. Market & Opportunity
2. User Needs & Pain Points
3. Competitive Landscape
4. Risks & Challenges
5. Critical Analysis (Devil's Advocate)
6. Strategic Recommendations

Provide a concise plan (2-3 sentences per area). Be thorough and detailed.`;

export const PROMPT_MARKET = (s: Readonly<PipelineState>) => `You are a market analyst for product management.

Original Question: ${s.query}
Research Plan: ${s.research_plan}

Provide a COMPREHENSIVE MARKET & OPPORTUNITY ANALYSIS with specific details:
- Market size estimate with numbers (TAM/SAM/SOM if applicable)
- Growth rate and trajectory (percentages, trends)
- Current market trends and dynamics
- Target customer segments and their characteristics
- Market maturity stage
- Entry barriers and opportunities

Be detailed, specific, and data-driven. Provide 6-8 substantive points.`;

export const PROMPT_USERS = (s: Readonly<PipelineState>) => `You are a user research expert conducting deep analysis.

Question: ${s.query}
Market Context: ${s.market_analysis}

Provide COMPREHENSIVE USER NEEDS & PAIN POINTS ANALYSIS:
- Define 2-3 primary user personas with demographics and behaviors
- Identify specific pain points with severity levels
- Articulate user expectations, desires, and motivations
- Map the user journey and friction points
- Identify adoption barriers (cost, complexity, switching costs, etc.)
- Analyze willingness to pay and value perception

Be specific and thorough. Provide 6-8 detailed insights.`;

export const PROMPT_COMPETITION = (s: Readonly<PipelineState>) => `You are a competitive intelligence analyst conducting thorough research.

Question: ${s.query}
Market Context: ${s.market_analysis}
User Context: ${s.user_insights}

Provide COMPREHENSIVE COMPETITIVE LANDSCAPE ANALYSIS:
- Identify specific competitors by name (direct and indirect)
- Analyze each competitor's positioning, strengths, and weaknesses
- Evaluate competitive advantages and moats
- Identify gaps in current market solutions
- Assess differentiation opportunities
- Analyze pricing strategies and business models
- Evaluate market share distribution

Be specific with company names and detailed analysis. Provide 6-8 strategic insights.`;

export const PROMPT_RISKS = (s: Readonly<PipelineState>) => `You are a risk assessment specialist conducting detailed analysis.

Question: ${s.query}
Market: ${s.market_analysis}
Competition: ${s.competitive_landscape}

Provide COMPREHENSIVE RISKS & CHALLENGES ASSESSMENT:
- Technical risks (scalability, architecture, integration, security)
- Market risks (timing, adoption, competition, saturation)
- Financial risks (burn rate, unit economics, profitability)
- Operational risks (team, resources, partnerships)
- Regulatory and compliance risks
- Execution challenges
- Mitigation strategies for each major risk

Be realistic and specific. Identify 6-8 significant risks, each paired with a mitigation strategy.`;

export const PROMPT_DEVILS_ADVOCATE = (s: Readonly<PipelineState>) => `You are a DEVIL'S ADVOCATE: a critical analyst whose job is to challenge assumptions and point out why this product might FAIL.

Question: ${s.query}

All Research:
- Market: ${s.market_analysis}
- Users: ${s.user_insights}
- Competition: ${s.competitive_landscape}
- Risks: ${s.risks_and_challenges}

Be brutally honest and critical. Identify:
- Why this product is likely to FAIL
- Over-optimistic assumptions in the research
- Hidden costs and challenges not yet considered
- Why competitors might crush this product
- Why users might NOT adopt it despite claimed pain points
- Timing issues (too early/too late to market)
- Resource constraints and execution impossibilities
- Financial reasons this won't be profitable
- Why the team/company might not be the right one to build this

Be pessimistic and blunt. Provide 8-10 critical points that challenge the viability of this product.`;

export const PROMPT_SYNTHESIZE = (s: Readonly<PipelineState>) => `You are a Chief Product Officer synthesizing research into a balanced decision framework.

Original Question: ${s.query}

Research Completed:
- Market Analysis: ${s.market_analysis}
- User Insights: ${s.user_insights}
- Competitive Landscape: ${s.competitive_landscape}
- Risks & Challenges: ${s.risks_and_challenges}
- Critical Analysis: ${s.devils_advocate}

Provide STRATEGIC RECOMMENDATIONS that weigh the opportunity against the critique:

1. **Clear Decision** (Go/No-Go/Pivot, with rationale covering both opportunities AND critical challenges)
2. **Key Success Metrics** (specific, measurable KPIs to track)
3. **Recommended Approach** (phased rollout, MVP strategy, or full launch)
4. **Timeline and Milestones** (with key decision points)
5. **Resource Requirements** (team, budget, time estimates)
6. **Go/No-Go Criteria** (what would make you stop or pivot)
7. **Decision Rationale** (acknowledging the devil's advocate points)

This should read as a complete decision framework.`;

export const STAGES: readonly PipelineStage[] = [
  { key: 'plan', title: 'Planning', output: 'research_plan', prompt: PROMPT_PLAN },
  { key: 'market_analysis', title: 'Market Analysis', output: 'market_analysis', prompt: PROMPT_MARKET },
  { key: 'user_insights', title: 'User Research', output: 'user_insights', prompt: PROMPT_USERS },
  { key: 'competitive_analysis', title: 'Competitive Analysis', output: 'competitive_landscape', prompt: PROMPT_COMPETITION },
  { key: 'risk_assessment', title: 'Risk Assessment', output: 'risks_and_challenges', prompt: PROMPT_RISKS },
  { key: 'devils_advocate', title: "Devil's Advocate", output: 'devils_advocate', prompt: PROMPT_DEVILS_ADVOCATE },
  { key: 'synthesize', title: 'Synthesis', output: 'recommendations', prompt: PROMPT_SYNTHESIZE }
];

export function renderReport(s: Readonly<PipelineState>): string {
  const sections = [
    s.query,
    s.market_analysis,
    s.user_insights,
    s.competitive_landscape,
    s.risks_and_challenges,
    s.devils_advocate,
    s.recommendations
  ];
  const body = REPORT_HEADINGS.map((heading, i) => `## ${heading}\n${sections[i]}\n`).join('\n');

  return `# Deep Research Report: Product Management Analysis

${body}
---
*Generated using Deep Research Mode*
*Total Tokens Used: ${s.usage.total_tokens} (Prompt: ${s.usage.prompt_tokens}, Completion: ${s.usage.completion_tokens})*
`;
}

export const DEEP_RESEARCH_ERROR_REPORT = (message: string) => `❌ **Deep Research Error**

An error occurred during the research process:
${message}

This might be due to:
- API rate limits (deep research makes multiple calls)
- Quota exhaustion
- Network issues

💡 Try:
- Waiting a few minutes
- Using standard research mode
- Checking your API quota at https://aistudio.google.com/
`;
