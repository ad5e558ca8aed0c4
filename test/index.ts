import { should } from 'micro-should';
import './block.test.ts';
import './crosstest.test.ts';
import './errors.test.ts';
import './inout.test.ts';
import './stream.test.ts';
import './utils.test.ts';
import './wrapper.test.ts';

should.run();
