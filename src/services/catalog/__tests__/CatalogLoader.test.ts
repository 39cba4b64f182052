import path from 'path';
import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '../../../utils/logger';
import { CatalogLoadError } from '../../errors';
import { ActionCatalog } from '../ActionCatalog';
import { CatalogLoader } from '../CatalogLoader';
import { ContextCatalog } from '../ContextCatalog';
import { slackSendMessage, TEST_ACTIONS } from '../../__tests__/fixtures';

const dataDir = path.resolve(__dirname, '../../../../data');
const loader = new CatalogLoader({ logger: createSilentLogger() });

describe('CatalogLoader', () => {
  it('loads the bundled sample catalogs', () => {
    const actions = loader.loadActionCatalog(path.join(dataDir, 'actions.json'));
    const context = loader.loadContextCatalog(path.join(dataDir, 'context.json'));

    expect(actions.size).toBe(10);
    expect(actions.getPlatforms()).toEqual([
      'slack',
      'gmail',
      'salesforce',
      'hubspot',
      'notion',
      'github',
      'google calendar',
      'trello',
    ]);
    expect(context.get('lead_score')).toEqual({ name: 'lead_score', type: 'number', exampleValue: 72.5 });
  });

  it('accepts a bare array and fills in optional flags', () => {
    const catalog = loader.parseActionCatalog([
      {
        id: 'notes.create_note',
        platform: 'notes',
        operation: 'create',
        entityType: 'note',
        parameterSchema: { body: { type: 'string' } },
      },
    ]);

    expect(catalog.get('notes.create_note')?.parameterSchema.body).toEqual({ type: 'string', required: false });
  });

  it('accepts a wrapped variable list', () => {
    const catalog = loader.parseContextCatalog({ variables: [{ name: 'owner', type: 'email' }] });
    expect(catalog.names()).toEqual(['owner']);
  });

  it('rejects documents that do not match the schema', () => {
    expect(() => loader.parseActionCatalog({ actions: [{ id: 'x', platform: 'p' }] })).toThrow(CatalogLoadError);
    expect(() =>
      loader.parseActionCatalog([{ ...slackSendMessage, parameterSchema: { a: { type: 'uuid', required: true } } }]),
    ).toThrow(/^Invalid action catalog \(inline\): /);
    expect(() => loader.parseContextCatalog({ vars: [] })).toThrow(/^Invalid context catalog \(inline\): /);
  });

  it('rejects pattern constraints that are not valid regular expressions', () => {
    const broken = {
      ...slackSendMessage,
      parameterSchema: { channel: { type: 'string', required: true, constraints: { pattern: '([' } } },
    };

    expect(() => loader.parseActionCatalog([broken])).toThrow(CatalogLoadError);
    expect(() => loader.parseActionCatalog([broken])).toThrow(
      /^Invalid action catalog \(inline\): slack\.send_message\.channel: Invalid regular expression/,
    );
  });

  it('reports unreadable files', () => {
    const missing = path.join(dataDir, 'does-not-exist.json');
    expect(() => loader.loadActionCatalog(missing)).toThrow(`Cannot read catalog file ${missing}`);
  });
});

describe('ActionCatalog', () => {
  it('keeps declaration order and indexes by id', () => {
    const catalog = new ActionCatalog(TEST_ACTIONS);

    expect(catalog.getAll().map((action) => action.id)).toEqual(TEST_ACTIONS.map((action) => action.id));
    expect(catalog.indexOf('crm.update_contact')).toBe(2);
    expect(catalog.indexOf('nope')).toBe(-1);
    expect(catalog.getByPlatform('SLACK').map((action) => action.id)).toEqual(['slack.send_message']);
  });

  it('is isolated from the input objects', () => {
    const source = { ...slackSendMessage, parameterSchema: { ...slackSendMessage.parameterSchema } };
    const catalog = new ActionCatalog([source]);
    source.parameterSchema = {};

    expect(Object.keys(catalog.get('slack.send_message')?.parameterSchema ?? {})).toEqual([
      'channel',
      'message',
      'thread_ts',
    ]);
    expect(Object.isFrozen(catalog.get('slack.send_message'))).toBe(true);
  });

  it('rejects duplicate ids', () => {
    expect(() => new ActionCatalog([slackSendMessage, slackSendMessage])).toThrow(
      'Duplicate action id in catalog: slack.send_message',
    );
  });
});

describe('ContextCatalog', () => {
  it('rejects duplicate names', () => {
    expect(
      () =>
        new ContextCatalog([
          { name: 'owner', type: 'email' },
          { name: 'owner', type: 'string' },
        ]),
    ).toThrow('Duplicate context variable name: owner');
  });

  it('starts empty', () => {
    expect(ContextCatalog.empty().size).toBe(0);
  });
});
