import { buildDiffOnlyPrompt, buildFullReviewPrompt, type RoleBrief } from '../lib/role-prompts.js';
import { parseReviewerReply, type ParsedReply } from './parsing.js';
import type { ReviewCategory } from './types.js';

export type CategoryDef = {
  title: string;
  reviewerName: string;
  brief: RoleBrief;
  buildPrompt: (payload: string, diffOnly: boolean) => string;
  parse: (reply: string) => ParsedReply;
};

function define(category: ReviewCategory, title: string, reviewerName: string, brief: RoleBrief): CategoryDef {
  return {
    title,
    reviewerName,
    brief,
    buildPrompt: (payload, diffOnly) =>
      diffOnly ? buildDiffOnlyPrompt(brief, payload) : buildFullReviewPrompt(brief, payload),
    parse: (reply) => parseReviewerReply(reply, category),
  };
}

export const CATEGORY_TABLE: Readonly<Record<ReviewCategory, CategoryDef>> = {
  security: define('security', 'Security', 'SecurityReviewer', {
    expert: 'a cybersecurity expert',
    subject: 'security issue',
    focus: [
      '**Input Validation**: sanitization and validation of user inputs',
      '**Authentication & Authorization**: access controls and permission checks',
      '**Data Protection**: sensitive data exposure, encryption issues',
      '**Injection Attacks**: SQL injection, XSS, command injection',
      '**Error Handling**: information disclosure through error messages',
      '**Cryptography**: weak encryption, insecure random number generation',
      '**Session Management**: session fixation and hijacking',
      '**OWASP Top 10**: common web application security risks',
    ],
    diffFocus: 'input validation, authentication, data protection, injection attacks, error handling, cryptography, session management',
    asks: [
      'Vulnerability type and impact level (Critical/High/Medium/Low)',
      'Specific remediation steps',
    ],
    example: 'Line 15: Vulnerability: SQL injection - user input is concatenated into the query string...',
    closing: 'Be thorough but concise. Focus on actionable security improvements.',
  }),

  performance: define('performance', 'Performance', 'PerformanceReviewer', {
    expert: 'a performance optimization expert',
    subject: 'performance issue',
    focus: [
      '**Algorithm Complexity**: time and space complexity',
      '**Data Structures**: optimal data structure usage',
      '**Memory Management**: leaks, unnecessary allocations',
      '**Database Operations**: query optimization, N+1 problems, indexing',
      '**Caching**: missing caching opportunities, cache invalidation',
      '**I/O Operations**: file handling, network call batching',
      '**Concurrency**: threading issues, async/await usage',
      '**Scalability**: code that will not scale with increased load',
    ],
    diffFocus: 'algorithm complexity, data structures, memory management, database operations, caching, I/O, concurrency',
    asks: [
      'The bottleneck or inefficiency',
      'Impact on application performance (High/Medium/Low)',
      'Specific optimization suggestions',
    ],
    example: 'Line 25: Issue: inefficient loop - O(n²) complexity due to nested iteration...',
    closing: 'Be specific about measurable performance gains.',
  }),

  style: define('style', 'Coding Practices', 'CodingPracticesReviewer', {
    expert: 'a senior software engineer expert in coding standards and best practices',
    subject: 'best practice issue',
    focus: [
      '**Code Structure**: organization, modularity, separation of concerns',
      '**Naming Conventions**: variable, function and class naming clarity',
      '**Function Design**: single responsibility, length, parameters',
      '**Error Handling**: proper exception handling and propagation',
      '**Code Duplication**: DRY violations, repeated logic',
      '**SOLID Principles** and appropriate design patterns',
      '**Maintainability**: ease of future modification',
    ],
    diffFocus: 'code structure, naming conventions, function design, error handling, duplication, SOLID principles',
    asks: [
      'The specific practice violation',
      'Why it matters for code quality',
      'Refactoring suggestions',
    ],
    example: "Line 42: Issue: use 'const' instead of 'var' for variables that don't change...",
    closing: 'Focus on practical improvements that enhance code quality.',
  }),

  architecture: define('architecture', 'Architecture', 'ArchitectureReviewer', {
    expert: 'a software architect',
    subject: 'architectural concern',
    focus: [
      '**Design Patterns**: appropriate usage, pattern violations',
      '**Coupling & Cohesion**: loose coupling, high cohesion',
      '**Abstraction Levels**: interface design',
      '**Dependency Management**: injection, inversion of control',
      '**Layered Architecture**: layer separation and boundaries',
      '**Extensibility**: modification points for new features',
      '**Data Flow**: information flow and state management',
      '**Technical Debt**: shortcuts that will need refactoring',
    ],
    diffFocus: 'design patterns, coupling and cohesion, abstraction levels, dependency management, layering, data flow',
    asks: [
      'The design issue or opportunity',
      'Architectural impact',
      'Design improvement suggestions',
    ],
    example: 'Line 33: Issue: tight coupling - direct database access should be abstracted...',
    closing: 'Focus on long-term architectural health.',
  }),

  readability: define('readability', 'Readability', 'ReadabilityReviewer', {
    expert: 'a code readability expert',
    subject: 'readability issue',
    focus: [
      '**Code Clarity**: self-explanatory code, clear logic flow',
      '**Naming**: descriptive variable and function names',
      '**Comments**: helpful comments, no obvious ones',
      '**Organization**: logical grouping, consistent formatting',
      '**Complexity**: overly complex expressions, nested logic',
      '**Magic Numbers**: hard-coded values without explanation',
    ],
    diffFocus: 'naming, code clarity, comments, organization, complexity',
    asks: [
      'The clarity problem',
      'Impact on maintainability',
      'A clearer alternative',
    ],
    example: "Line 67: Issue: variable name 'data' is too generic - consider 'filteredUsers'...",
    closing: 'Focus on making code more accessible to other developers.',
  }),

  testability: define('testability', 'Testability', 'TestabilityReviewer', {
    expert: 'a test engineering expert',
    subject: 'testability issue',
    focus: [
      '**Test Coverage**: missing scenarios, edge cases',
      '**Dependency Injection**: hard dependencies, mocking difficulties',
      '**Function Design**: pure functions, side effect isolation',
      '**State Management**: global state, stateful operations',
      '**External Dependencies**: database, API, file system access',
      '**Error Conditions**: exception paths that need tests',
      '**Mock Points**: interfaces for mocking, testable boundaries',
    ],
    diffFocus: 'test coverage, dependency injection, side effects, global state, external dependencies, error paths',
    asks: [
      'The testing challenge',
      'Refactoring for better testability',
      'Test scenarios to add',
    ],
    example: 'Line 12: Issue: hard-coded HTTP client makes this function impossible to unit test...',
    closing: 'Focus on making the code easier to test thoroughly.',
  }),
};
