import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompileError, lex } from '@stabel/compiler'
import {
	formatCompileError,
	formatNativeCompilerError,
	formatReadError,
	formatWriteError,
	getErrorMessage,
	isNodeError,
	listTokens,
	nativeCompilerArgs,
	resolveOutputFilename,
	resolveOutputPath,
} from '../src/utils.ts'

function nodeError(message: string, code: string): NodeJS.ErrnoException {
	const error: NodeJS.ErrnoException = new Error(message)
	error.code = code
	return error
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(nodeError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const result = formatReadError('/path/to/prog.stabel', nodeError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[STCLI001] file not found: /path/to/prog.stabel')
	})

	it('should format other errors with the reason', () => {
		const result = formatReadError('/path/to/prog.stabel', nodeError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[STCLI002] cannot read file: permission denied')
	})

	it('should handle plain Error', () => {
		const result = formatReadError('/path/to/prog.stabel', new Error('unknown error'))
		assert.strictEqual(result, '[STCLI002] cannot read file: unknown error')
	})
})

describe('formatWriteError', () => {
	it('should include the reason', () => {
		assert.strictEqual(formatWriteError(new Error('disk full')), '[STCLI003] cannot write file: disk full')
	})
})

describe('formatNativeCompilerError', () => {
	it('should report a missing compiler', () => {
		const result = formatNativeCompilerError('gcc', nodeError('spawn gcc ENOENT', 'ENOENT'))
		assert.strictEqual(result, '[STCLI004] native compiler `gcc` failed: command not found')
	})

	it('should report compiler output', () => {
		const result = formatNativeCompilerError('cc', new Error('Command failed: cc prog.c\n'))
		assert.strictEqual(result, '[STCLI004] native compiler `cc` failed: Command failed: cc prog.c')
	})
})

describe('formatCompileError', () => {
	it('should return CompileError message directly', () => {
		const result = formatCompileError(new CompileError('error[STGEN003]: unrecognized identifier `foo`'))
		assert.strictEqual(result, 'error[STGEN003]: unrecognized identifier `foo`')
	})

	it('should wrap other errors', () => {
		const result = formatCompileError(new Error('something went wrong'))
		assert.strictEqual(result, '[STCLI005] compilation failed: something went wrong')
	})
})

describe('resolveOutputFilename', () => {
	it('should replace .stabel with the output extension', () => {
		assert.strictEqual(resolveOutputFilename('prog.stabel', 'c'), 'prog.c')
		assert.strictEqual(resolveOutputFilename('prog.stabel', 'out'), 'prog.out')
	})

	it('should strip directories', () => {
		assert.strictEqual(resolveOutputFilename('src/lib/prog.stabel', 'c'), 'prog.c')
	})

	it('should append to names without the extension', () => {
		assert.strictEqual(resolveOutputFilename('prog', 'c'), 'prog.c')
	})
})

describe('resolveOutputPath', () => {
	it('should default to the current directory', () => {
		assert.strictEqual(resolveOutputPath('src/prog.stabel', undefined, 'c'), 'prog.c')
	})

	it('should join the output directory', () => {
		assert.strictEqual(resolveOutputPath('src/prog.stabel', 'build', 'out'), 'build/prog.out')
	})
})

describe('nativeCompilerArgs', () => {
	it('should pass the source and the -o target', () => {
		assert.deepStrictEqual(nativeCompilerArgs('build/prog.c', 'build/prog.out'), [
			'build/prog.c',
			'-o',
			'build/prog.out',
		])
	})
})

describe('listTokens', () => {
	it('should render one line per token', () => {
		assert.deepStrictEqual(listTokens(lex('12 x def\nx :')), [
			'INT(12)',
			'ID(x)',
			'ID(def)',
			'ID(x)',
			'OP(:)',
		])
	})

	it('should be empty for blank source', () => {
		assert.deepStrictEqual(listTokens(lex(' \n ')), [])
	})
})
