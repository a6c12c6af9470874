/**
 * persona-desk - Agent Type Definitions
 *
 * エージェント = 設定されたペルソナとして振る舞い、各モジュールに処理を委譲する
 */

import type { AgentConfig, AgentLogger, LLMClient, LLMProvider, TextGenerator } from '@persona-desk/persona-spec';
import type { StakeholderPositions } from '@persona-desk/modules';

// =============================================================================
// Construction
// =============================================================================

export interface PersonaAgentDeps {
  config: AgentConfig;
  logger: AgentLogger;
  /** 未指定なら設定から LLMRouter を組み立てる */
  llm?: TextGenerator;
  /** LLMRouter 用のクライアント差し替え */
  clients?: Partial<Record<LLMProvider, LLMClient>>;
  now?: () => Date;
}

// =============================================================================
// Results
// =============================================================================

export interface ConsensusResult {
  topic: string;
  stakeholders: string[];
  consensus_proposal: string;
  timestamp: string;
  facilitator: string;
}

export type { StakeholderPositions };

// =============================================================================
// Interactive session
// =============================================================================

/**
 * 対話セッションの入出力
 */
export interface SessionIO {
  /** 1行読む。入力終了なら null */
  read(prompt: string): Promise<string | null>;
  write(text: string): void;
}

export const EXIT_COMMANDS = ['exit', 'quit', '終了'] as const;
