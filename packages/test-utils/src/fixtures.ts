/**
 * Shared test fixtures for Strata tests
 */

const wsgiApp: Record<string, string> = {
  'manage.py': 'import sys\n',
  'app/__init__.py': '',
  'app/wsgi.py': 'application = None\n',
  'core/models.py': 'class Model:\n    pass\n',
};

export const fixtures = {
  manifests: {
    /** Pure-Python web framework, nothing to compile */
    flask: 'flask==2.0\n',

    /** Imaging library with C extensions (needs compiler + zlib/jpeg headers) */
    pillow: 'pillow==8.2\n',

    /** Typical database-backed app */
    databaseApp: [
      '# web stack',
      'Django>=3.2,<3.3',
      'djangorestframework==3.12.4',
      'psycopg2>=2.8.6,<2.9  # compiled against libpq',
      '',
    ].join('\n'),

    /** Everything the full profile serves: database driver and imaging */
    fullApp: ['Django>=3.2,<3.3', 'psycopg2>=2.8.6,<2.9', 'Pillow>=8.2.0,<8.3', ''].join('\n'),
  },

  sources: {
    /** Minimal WSGI application layout */
    wsgiApp,
  },
};
