/**
 * armature-di - Basic Example
 *
 * Demonstrates the container lifecycle:
 * - Parameters and placeholders
 * - Autowiring with decorators
 * - Parent definitions and tags
 * - A custom compiler pass
 * - Lazy services and async construction
 */

import 'reflect-metadata';

import {
  createContainerBuilder,
  ICompilerPass,
  IContainerBuilder,
  Inject,
  Injectable,
  InvalidReferenceBehavior,
  Optional,
  Reference,
} from '../src/index';

// ==================== Services ====================

interface Transport {
  send(to: string, body: string): void;
}

class ConsoleTransport implements Transport {
  constructor(private readonly prefix: string) {}

  send(to: string, body: string): void {
    console.log(`${this.prefix} -> ${to}: ${body}`);
  }
}

class AuditLog {
  readonly entries: string[] = [];

  record(entry: string): void {
    this.entries.push(entry);
  }
}

class Mailer {
  private audit: AuditLog | null = null;

  constructor(
    private readonly transport: Transport,
    private readonly sender: string,
  ) {}

  setAudit(audit: AuditLog | null): void {
    this.audit = audit;
  }

  deliver(to: string, body: string): void {
    this.transport.send(to, `[${this.sender}] ${body}`);
    this.audit?.record(`mail to ${to}`);
  }
}

@Injectable()
class SignupService {
  constructor(
    @Inject('mailer.welcome') private readonly mailer: Mailer,
    @Optional() private readonly audit?: AuditLog,
  ) {}

  signup(email: string): void {
    this.mailer.deliver(email, 'Welcome aboard!');
    this.audit?.record(`signup ${email}`);
  }
}

class ReportIndex {
  readonly names: string[] = [];

  add(name: string): void {
    this.names.push(name);
  }
}

class SlowCatalog {
  static loads = 0;

  constructor() {
    SlowCatalog.loads++;
  }

  list(): string[] {
    return ['daily', 'weekly'];
  }
}

class Database {
  constructor(readonly dsn: string) {}

  static async connect(dsn: string): Promise<Database> {
    await new Promise((resolve) => setTimeout(resolve, 5));
    return new Database(dsn);
  }
}

// ==================== Compiler Pass ====================

class ReportIndexPass implements ICompilerPass {
  process(builder: IContainerBuilder): void {
    const index = builder.getDefinition('report.index');
    for (const [, tags] of builder.findTaggedServiceIds('report')) {
      for (const attributes of tags) {
        index.addMethodCall('add', [attributes.name]);
      }
    }
  }
}

// ==================== Main ====================

async function main() {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  armature-di - Basic Example');
  console.log('═══════════════════════════════════════════════════════════\n');

  const builder = createContainerBuilder({ debug: false });

  // Parameters
  builder.setParameter('app.name', 'demo');
  builder.setParameter('mail.sender', 'no-reply@%app.name%.test');
  builder.setParameter('db.dsn', 'sqlite://%app.name%.db');

  // Definitions
  builder.register('transport', ConsoleTransport).setArguments(['[mail]']).setPublic(false);
  builder.register('audit', AuditLog);
  builder.setAlias('AuditLog', 'audit');

  builder
    .register('mailer.base', Mailer)
    .setAbstract(true)
    .setArguments([new Reference('transport'), '%mail.sender%'])
    .addMethodCall('setAudit', [new Reference('audit', InvalidReferenceBehavior.Null)]);
  builder.register('mailer.welcome').setParent('mailer.base');

  builder.autowire(SignupService);

  builder.register('report.index', ReportIndex);
  builder.register('report.daily', String).addTag('report', { name: 'daily' });
  builder.register('report.weekly', String).addTag('report', { name: 'weekly' });
  builder.addCompilerPass(new ReportIndexPass());

  builder.register('catalog', SlowCatalog).setLazy(true);
  builder.register('db').setFactory(Database.connect).setArguments(['%db.dsn%']);

  const container = builder.compile();

  console.log('\n--- Autowiring ---');
  container.get(SignupService).signup('ada@example.com');
  console.log('Audit:', container.get('audit', AuditLog).entries);

  console.log('\n--- Compiler pass ---');
  console.log('Reports:', container.get('report.index', ReportIndex).names);

  console.log('\n--- Lazy service ---');
  const catalog = container.get('catalog', SlowCatalog);
  console.log('Loaded before use:', SlowCatalog.loads);
  console.log('Catalog:', catalog.list());
  console.log('Loaded after use:', SlowCatalog.loads);

  console.log('\n--- Async construction ---');
  const db = await container.resolve('db', Database);
  console.log('Connected to', db.dsn);

  console.log('\n--- Visibility ---');
  console.log('has("transport"):', container.has('transport'));

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

// Run
main().catch(console.error);
