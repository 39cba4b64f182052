import { Mock, vi } from 'vitest';
import { IntegrationAction } from '../../models/action.model';
import { ContextVariable } from '../../models/context.model';
import { ParsedRequest, freezeParsedRequest } from '../../models/request.model';
import { ParameterSet } from '../../models/run.model';
import { ActionCatalog } from '../catalog/ActionCatalog';
import { ParseInput, RequestParser } from '../parser/RequestParser';
import { CompletionModel, CompletionOptions } from '../llm/types';

export const slackSendMessage: IntegrationAction = {
  id: 'slack.send_message',
  platform: 'slack',
  operation: 'send',
  entityType: 'message',
  parameterSchema: {
    channel: { type: 'string', required: true, constraints: { pattern: '^#' } },
    message: { type: 'string', required: true, constraints: { minLength: 1 } },
    thread_ts: { type: 'string', required: false },
  },
};

export const gmailSendEmail: IntegrationAction = {
  id: 'gmail.send_email',
  platform: 'gmail',
  operation: 'send',
  entityType: 'email',
  parameterSchema: {
    to: { type: 'email', required: true, aliases: ['email'] },
    subject: { type: 'string', required: true },
    body: { type: 'string', required: true, aliases: ['message'] },
  },
};

export const crmUpdateContact: IntegrationAction = {
  id: 'crm.update_contact',
  platform: 'crm',
  operation: 'update',
  entityType: 'contact',
  parameterSchema: {
    contact_id: { type: 'string', required: true },
    email: { type: 'email', required: false },
    lead_score: { type: 'integer', required: false, constraints: { minimum: 0, maximum: 100 } },
  },
};

export const helpdeskUpdateTicket: IntegrationAction = {
  id: 'helpdesk.update_ticket',
  platform: 'helpdesk',
  operation: 'update',
  entityType: 'ticket',
  parameterSchema: {
    ticket_id: { type: 'string', required: true },
    status: { type: 'string', required: false, constraints: { enum: ['open', 'closed'] } },
  },
};

export const newsletterAddSubscriber: IntegrationAction = {
  id: 'newsletter.add_subscriber',
  platform: 'newsletter',
  operation: 'create',
  entityType: 'contact',
  parameterSchema: {
    email: { type: 'email', required: true },
    name: { type: 'string', required: false },
  },
};

export const TEST_ACTIONS: IntegrationAction[] = [
  slackSendMessage,
  gmailSendEmail,
  crmUpdateContact,
  helpdeskUpdateTicket,
  newsletterAddSubscriber,
];

export function testCatalog(actions: IntegrationAction[] = TEST_ACTIONS): ActionCatalog {
  return new ActionCatalog(actions);
}

export const TEST_VARIABLES: ContextVariable[] = [
  { name: 'contact_id', type: 'string', exampleValue: 'c-1' },
  { name: 'lead_score', type: 'number', exampleValue: 72.5 },
  { name: 'is_active', type: 'boolean' },
];

export function parsedRequest(overrides: Partial<ParsedRequest> = {}): ParsedRequest {
  return freezeParsedRequest({
    rawText: 'test request',
    platformHint: null,
    operationHint: null,
    entityTypeHint: null,
    literalParams: {},
    ambiguityFlags: [],
    ...overrides,
  });
}

export function parameterSet(overrides: Partial<ParameterSet> = {}): ParameterSet {
  return { values: {}, unresolved: new Set(), validationErrors: {}, rejected: {}, ...overrides };
}

/** Parser that ignores the text and returns a fixed request */
export class StubParser implements RequestParser {
  public readonly calls: ParseInput[] = [];

  constructor(private readonly result: Omit<ParsedRequest, 'rawText'>) {}

  public async parse(input: ParseInput): Promise<ParsedRequest> {
    this.calls.push(input);
    return freezeParsedRequest({ ...this.result, rawText: input.rawText });
  }
}

/** Completion model answering from a function of the prompt */
export interface StubModel extends CompletionModel {
  complete: Mock<(prompt: string, options: CompletionOptions) => Promise<string>>;
}

export function stubModel(answer: (prompt: string) => string): StubModel {
  return { complete: vi.fn(async (prompt: string, _options: CompletionOptions) => answer(prompt)) };
}
