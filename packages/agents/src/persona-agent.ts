/**
 * Persona Agent
 *
 * ペルソナとして考え、文書・会議・評価・相談の各モジュールへ委譲する
 */

import { randomUUID } from 'crypto';
import type { AgentConfig, AgentLogger, TextGenerator } from '@persona-desk/persona-spec';
import { LLMRouter, ValidationError, formatIssues } from '@persona-desk/runtime';
import {
  ConsultationModule,
  DocumentGenerator,
  MeetingFacilitator,
  PersonalityAssessor,
  StakeholderPositionsSchema,
  createModuleContext,
  type ActionItem,
  type AssessmentResult,
  type BusinessCaseAnalysis,
  type DecisionSupportResult,
  type MeetingInfo,
  type MeetingPlan,
  type OneOnOnePlan,
  type QuestionnaireItem,
} from '@persona-desk/modules';
import { buildPersonaPrompt, formatContext } from './persona-prompt';
import { EXIT_COMMANDS, type ConsensusResult, type PersonaAgentDeps, type SessionIO } from './types';

export class PersonaAgent {
  readonly config: AgentConfig;
  readonly llm: TextGenerator;
  readonly personaPrompt: string;

  private readonly logger: AgentLogger;
  private readonly now: () => Date;
  private readonly documents: DocumentGenerator;
  private readonly meetings: MeetingFacilitator;
  private readonly assessor: PersonalityAssessor;
  private readonly consultant: ConsultationModule;

  constructor(deps: PersonaAgentDeps) {
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'agent' });
    this.now = deps.now ?? (() => new Date());
    this.personaPrompt = buildPersonaPrompt(deps.config.personality);
    this.llm =
      deps.llm ??
      new LLMRouter({
        config: deps.config.ai_model,
        systemPrompt: this.personaPrompt,
        personaName: deps.config.personality.name,
        logger: deps.logger,
        clients: deps.clients,
        now: this.now,
      });

    const ctx = createModuleContext({ config: deps.config, llm: this.llm, logger: deps.logger, now: this.now });
    this.documents = new DocumentGenerator(ctx);
    this.meetings = new MeetingFacilitator(ctx);
    this.assessor = new PersonalityAssessor(ctx);
    this.consultant = new ConsultationModule(ctx);

    this.logger.info('Persona agent initialized', { persona: this.name, model: deps.config.ai_model.default_model });
  }

  get name(): string {
    return this.config.personality.name;
  }

  // ===========================================================================
  // Thinking
  // ===========================================================================

  async think(query: string, context?: Record<string, unknown>): Promise<string> {
    const prompt = `【思考要請】
${query}

【追加コンテキスト】
${formatContext(context)}

${this.name}として、この件について考え、あなたの経験と視点に基づく見解を述べてください。`;

    const log = this.logger.child({ traceId: randomUUID() });
    log.debug('Thinking', { query: query.slice(0, 50) });
    const response = await this.llm.generateResponse(prompt);
    log.info('Thought completed', { response_length: response.length });
    return response;
  }

  async buildConsensus(topic: string, positions: unknown): Promise<ConsensusResult> {
    const parsed = StakeholderPositionsSchema.safeParse(positions);
    if (!parsed.success) {
      throw new ValidationError(formatIssues(parsed.error.issues));
    }

    const stakeholderLines = formatContext(parsed.data);
    const prompt = `【合意形成支援】
トピック: ${topic}

【ステークホルダーの立場】
${stakeholderLines}

${this.name}として、全員が納得できる合意点を見つけるための提案をしてください。
次の構成で回答してください：

1. 現状の整理
2. 共通の関心事
3. 対立点
4. 合意に向けた提案
5. 次のステップ`;

    const proposal = await this.llm.generateResponse(prompt);
    this.logger.info('Consensus proposal built', { topic });

    return {
      topic,
      stakeholders: Object.keys(parsed.data),
      consensus_proposal: proposal,
      timestamp: this.now().toISOString(),
      facilitator: this.name,
    };
  }

  // ===========================================================================
  // Delegations
  // ===========================================================================

  createDocument(docType: string, topic: string, requirements?: Record<string, unknown>): Promise<string> {
    return this.documents.generateDocument(docType, topic, requirements);
  }

  createTemplate(docType: string, content: string): string {
    return this.documents.createTemplate(docType, content);
  }

  listTemplates(): Promise<string[]> {
    return this.documents.listAvailableTemplates();
  }

  facilitateMeeting(
    meetingType: string,
    agenda: string[],
    participants: string[],
    durationMinutes?: number
  ): Promise<MeetingPlan> {
    return this.meetings.facilitateMeeting(meetingType, agenda, participants, durationMinutes);
  }

  conductOneOnOne(participant: string, topics?: string[]): Promise<OneOnOnePlan> {
    return this.meetings.conductOneOnOne(participant, topics);
  }

  generateMeetingMinutes(
    meetingInfo: Partial<MeetingInfo>,
    discussionPoints: string[],
    decisions: string[],
    actionItems: Array<Partial<ActionItem> & { task: string }>
  ): Promise<string> {
    return this.meetings.generateMeetingMinutes(meetingInfo, discussionPoints, decisions, actionItems);
  }

  assessPersonality(
    assessmentType: string,
    responses: Record<string, unknown>,
    participant?: string
  ): Promise<AssessmentResult> {
    return this.assessor.assessPersonality(assessmentType, responses, participant);
  }

  supportedAssessmentTypes(): string[] {
    return this.assessor.supportedTypes();
  }

  createAssessmentQuestionnaire(assessmentType: string): Promise<QuestionnaireItem[]> {
    return this.assessor.createAssessmentQuestionnaire(assessmentType);
  }

  provideConsultation(consultationType: string, details: Record<string, unknown>): Promise<string> {
    return this.consultant.provideConsultation(consultationType, details);
  }

  makeProposal(topic: string, requirements: Record<string, unknown>): Promise<string> {
    return this.consultant.makeProposal(topic, requirements);
  }

  analyzeBusinessCase(description: string, focus?: string[]): Promise<BusinessCaseAnalysis> {
    return this.consultant.analyzeBusinessCase(description, focus);
  }

  provideDecisionSupport(context: string, options: unknown[]): Promise<DecisionSupportResult> {
    return this.consultant.provideDecisionSupport(context, options);
  }

  // ===========================================================================
  // Interactive session
  // ===========================================================================

  async interactiveSession(io: SessionIO): Promise<void> {
    io.write(`\n${this.name}へようこそ。`);
    io.write('ご相談やご質問をどうぞ。（exit で終了します）\n');

    for (;;) {
      const line = await io.read('あなた: ');
      if (line === null) {
        io.write(`\n${this.name}: 失礼いたします。またいつでもお声がけください。`);
        return;
      }

      const input = line.trim();
      if (!input) {
        continue;
      }

      const exitCommands: readonly string[] = EXIT_COMMANDS;
      if (exitCommands.includes(input.toLowerCase())) {
        io.write(`\n${this.name}: ありがとうございました。また何かあればお声がけください。`);
        return;
      }

      try {
        io.write(`\n${this.name}: （考え中...）`);
        const answer = await this.think(input);
        io.write(`\n${this.name}: ${answer}\n`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('Interactive session turn failed', { error: message });
        io.write(`\n申し訳ございません。エラーが発生しました: ${message}\n`);
      }
    }
  }
}
