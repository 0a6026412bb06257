import { describe, expect, it } from 'vitest';

import { Container } from '../src/core/container.js';
import { token } from '../src/core/token.js';
import { Abstract, Implements } from '../src/decorators/index.js';
import { ConfigurationError, NotRegisteredError } from '../src/errors/errors.js';

interface Notifier {
  notify(message: string): string;
}
const NotifierT = token<Notifier>('Notifier');
const AuditSinkT = token<Notifier>('AuditSink');

describe('registerAssemblyTypes()', () => {
  it('registers concrete classes under the services they implement', () => {
    @Abstract()
    @Implements(AuditSinkT)
    class BaseNotifier implements Notifier {
      notify(message: string): string {
        return message;
      }
    }

    @Implements(NotifierT)
    class EmailNotifier extends BaseNotifier {}

    const container = new Container().registerAssemblyTypes([BaseNotifier, EmailNotifier]);

    expect(container.resolve(NotifierT)).toBeInstanceOf(EmailNotifier);
    expect(container.resolve(AuditSinkT)).toBeInstanceOf(EmailNotifier);
    expect(container.resolve(NotifierT)).not.toBe(container.resolve(NotifierT));
    expect(container.getRegisteredServices()).toEqual(['AuditSink', 'Notifier']);
  });

  it('scans module namespace objects and skips non-classes', () => {
    @Implements(NotifierT)
    class SmsNotifier implements Notifier {
      notify(message: string): string {
        return `sms:${message}`;
      }
    }

    const namespace = {
      SmsNotifier,
      VERSION: '1.0.0',
      helper: () => 'not a class',
    };
    const container = new Container().registerAssemblyTypes(namespace);

    expect(container.resolve(NotifierT).notify('hi')).toBe('sms:hi');
    expect(container.getRegisteredServices()).toEqual(['Notifier']);
  });

  it('keeps the first match and existing registrations', () => {
    @Implements(NotifierT)
    class FirstNotifier {
      notify(): string {
        return 'first';
      }
    }
    @Implements(NotifierT, AuditSinkT)
    class SecondNotifier {
      notify(): string {
        return 'second';
      }
    }
    class ManualSink {
      notify(): string {
        return 'manual';
      }
    }

    const container = new Container({ overwritePolicy: 'error' })
      .register(AuditSinkT, ManualSink)
      .registerAssemblyTypes([FirstNotifier, SecondNotifier]);

    expect(container.resolve(NotifierT).notify('')).toBe('first');
    expect(container.resolve(AuditSinkT).notify('')).toBe('manual');
  });

  it('applies the predicate', () => {
    @Implements(NotifierT)
    class PushNotifier {
      notify(): string {
        return 'push';
      }
    }
    @Implements(AuditSinkT)
    class FileSink {
      notify(): string {
        return 'file';
      }
    }

    const container = new Container().registerAssemblyTypes(
      [PushNotifier, FileSink],
      (type) => type.name.endsWith('Sink')
    );

    expect(container.resolve(AuditSinkT)).toBeInstanceOf(FileSink);
    expect(() => container.resolve(NotifierT)).toThrow(NotRegisteredError);
  });

  it('ignores classes without @Implements and rejects non-objects', () => {
    class Plain {}
    const container = new Container().registerAssemblyTypes(new Set([Plain]));

    expect(container.getRegisteredServices()).toEqual([]);
    expect(() => container.registerAssemblyTypes(null as never)).toThrow(ConfigurationError);
  });
});
