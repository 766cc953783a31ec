/**
 * @jest-environment node
 */

import { TransportError } from '../src/errors';
import {
  BANNER,
  maskSecret,
  renderInviteRequest,
  renderRows,
  renderSendSummary,
  renderTransportFailure,
  renderUserList,
  renderVerdict,
} from '../src/report';

import type { TableRecord } from '../src/types';

import { registrant } from './helpers/fixtures';

describe('maskSecret', () => {
  it('keeps the first and last four characters of a long secret', () => {
    expect(maskSecret('test-secret-value')).toBe('test...alue');
  });

  it('hides short secrets entirely', () => {
    expect(maskSecret('short')).toBe('********');
    expect(maskSecret('12345678')).toBe('********');
  });
});

describe('renderRows', () => {
  it('limits the rows and counts the rest', () => {
    const rows: TableRecord[] = [
      { Name: 'Ada', Email: 'ada@example.com' },
      { Name: 'Grace', Email: 'grace@x.com' },
      { Name: 'Alan' },
    ];

    expect(renderRows(['Name', 'Email'], rows, 2)).toEqual([
      'Name | Email',
      'Ada | ada@example.com',
      'Grace | grace@x.com',
      '... 1 more row(s)',
    ]);
    expect(renderRows(['Name', 'Email'], rows, 5)[3]).toBe('Alan | ');
  });
});

describe('renderUserList', () => {
  it('shows N/A for blank names and emails', () => {
    expect(renderUserList([registrant(1, 'Ada', ' ada@example.com '), registrant(2, ' ', '')])).toEqual([
      '  1. Ada (ada@example.com)',
      '  2. N/A (N/A)',
    ]);
  });
});

describe('renderInviteRequest', () => {
  const payload = {
    role: 'manager',
    invites: [
      { firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.com', customMessage: 'Hi', inviteRole: '1' },
      { firstName: 'Plato', lastName: '', email: 'plato@example.com', customMessage: 'Hi', inviteRole: '1' },
    ],
  };

  it('never prints the API key', () => {
    const lines = renderInviteRequest('https://api.test.local/organizations/org-1/members', payload);

    expect(lines.slice(0, 10)).toEqual([
      '',
      BANNER,
      'API CALL DETAILS',
      BANNER,
      '',
      'Endpoint: POST https://api.test.local/organizations/org-1/members',
      '',
      'Headers:',
      '  Authorization: Bearer [API_KEY]',
      '  Content-Type: application/json',
    ]);
  });

  it('lists each invite with its role and message', () => {
    const lines = renderInviteRequest('https://api.test.local/organizations/org-1/members', payload);

    expect(lines.slice(-10)).toEqual([
      '',
      '1. Ada Lovelace',
      '   Email: ada@example.com',
      '   Role: manager',
      '   Message: Hi',
      '',
      '2. Plato',
      '   Email: plato@example.com',
      '   Role: manager',
      '   Message: Hi',
    ]);
  });
});

describe('renderTransportFailure', () => {
  it('omits status and body when there was no response', () => {
    expect(renderTransportFailure(new TransportError('POST /x failed: timeout'), '  ')).toEqual([
      '  Error: POST /x failed: timeout',
    ]);
  });
});

describe('renderSendSummary', () => {
  it('reports success and failure', () => {
    expect(renderSendSummary({ success: true, sent: 3, response: {} })[3]).toBe('  Successfully sent 3 invite(s)');
    expect(renderSendSummary({ success: false, error: 'nope' })[3]).toBe('  Failed to send invites: nope');
  });
});

describe('renderVerdict', () => {
  it('shows the normalized email and the member role', () => {
    expect(renderVerdict(registrant(2, 'Grace Hopper ', ' Grace@X.com'), 'member', 'admin')).toEqual([
      '',
      '✗ ALREADY A MEMBER: Grace Hopper (grace@x.com)',
      '    Role: admin',
    ]);
  });

  it('marks rows without an email as skipped', () => {
    expect(renderVerdict(registrant(4, 'Nobody', 'nan'), 'skipped')).toEqual(['', '⚠ Skipping row 4: No email address']);
  });
});
