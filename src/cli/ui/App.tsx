/**
 * Ink-based TUI for the combined timeline
 * Two panes: timeline list on the left, selected post with its replies on the right
 */

import React, { useReducer, useEffect, useRef } from 'react'
import { render, Box, Text, useApp, useInput, useStdout } from 'ink'
import {
  PLATFORM_TYPES,
  platformColor,
  platformIcon,
  platformName,
  type IAccount,
  type IPost,
  type PlatformType,
  type ReplyItem,
} from '@/platforms/types'
import { errorMessage } from '@/platforms/errors'
import type { Database } from '@/store/db'
import type { Logger } from '@/helpers/logger'
import type { WorkerHandle } from '@/sync/worker'
import {
  fetchConversation,
  interact,
  refreshTimeline,
  submitPost,
  submitReply,
  type SyncCommand,
  type SyncResult,
} from '@/sync/commands'
import {
  accountsForNetworks,
  applyResult,
  beginLoadingReplies,
  filterName,
  filterPosts,
  findAccountForPost,
  initialTimelineState,
  nextFilter,
  searchPosts,
  type TimelineFilter,
  type TimelineState,
} from '@/sync/timeline-state'
import { emojify, postHeader, postStats, preview, replyIndent, truncateToWidth } from '../format'
import { openUrlInBrowser } from '../browser'

// ==================== Types ====================

export type FocusedPane = 'timeline' | 'detail'

export type Mode = 'normal' | 'compose' | 'search' | 'help'

const POLL_INTERVAL_MS = 100

// Lines a post occupies in the timeline pane
const LINES_PER_POST = 3

export interface AppState {
  timeline: TimelineState
  filter: TimelineFilter
  query: string // Applied search
  selectedIndex: number
  selectedReply: number | null
  detailPostId: string | null // Post whose replies the detail pane is waiting for
  focus: FocusedPane
  mode: Mode
  inputText: string
  inputCursorPos: number
  composeNetworks: PlatformType[]
  replyTo: IPost | null

  // Terminal dimensions
  rows: number
  cols: number
}

type Action =
  | { type: 'RESULT'; result: SyncResult }
  | { type: 'SET_STATUS'; text: string; loading?: boolean }
  | { type: 'SELECT_POST'; index: number }
  | { type: 'SELECT_REPLY'; index: number | null }
  | { type: 'LOAD_REPLIES'; postId: string }
  | { type: 'SET_FOCUS'; focus: FocusedPane }
  | { type: 'SET_MODE'; mode: Mode }
  | { type: 'OPEN_COMPOSE'; replyTo: IPost | null; text: string; networks: PlatformType[] }
  | { type: 'SET_INPUT_TEXT'; text: string }
  | { type: 'SET_INPUT_CURSOR_POS'; pos: number }
  | { type: 'SET_COMPOSE_NETWORKS'; networks: PlatformType[] }
  | { type: 'SET_FILTER'; filter: TimelineFilter }
  | { type: 'SET_QUERY'; query: string }
  | { type: 'SET_DIMENSIONS'; rows: number; cols: number }

// ==================== Reducer ====================

export function visiblePosts(state: AppState): IPost[] {
  return searchPosts(filterPosts(state.timeline.posts, state.filter), state.query)
}

function clampIndex(index: number, length: number): number {
  return Math.max(0, Math.min(index, length - 1))
}

function withSelection(state: AppState, index: number): AppState {
  const selectedIndex = clampIndex(index, visiblePosts(state).length)
  if (selectedIndex === state.selectedIndex) return state
  return {
    ...state,
    selectedIndex,
    selectedReply: null,
    detailPostId: null,
    timeline: { ...state.timeline, replies: [], loadingReplies: false },
  }
}

function reducer(state: AppState, action: Action): AppState {
  switch (action.type) {
    case 'RESULT': {
      const { result } = action
      // Replies for a post that is no longer selected
      if (result.type === 'context-fetched' && result.postId !== state.detailPostId) {
        return state
      }
      const next = { ...state, timeline: applyResult(state.timeline, result) }
      if (result.type === 'timeline-refreshed') {
        return { ...next, selectedIndex: clampIndex(state.selectedIndex, visiblePosts(next).length) }
      }
      return next
    }

    case 'SET_STATUS':
      return {
        ...state,
        timeline: { ...state.timeline, status: action.text, loading: action.loading ?? false },
      }

    case 'SELECT_POST':
      return withSelection(state, action.index)

    case 'SELECT_REPLY':
      return { ...state, selectedReply: action.index }

    case 'LOAD_REPLIES':
      return { ...state, detailPostId: action.postId, timeline: beginLoadingReplies(state.timeline) }

    case 'SET_FOCUS':
      return { ...state, focus: action.focus, selectedReply: null }

    case 'SET_MODE':
      return { ...state, mode: action.mode }

    case 'OPEN_COMPOSE':
      return {
        ...state,
        mode: 'compose',
        replyTo: action.replyTo,
        inputText: action.text,
        inputCursorPos: action.text.length,
        composeNetworks: action.networks,
      }

    case 'SET_INPUT_TEXT':
      return { ...state, inputText: action.text, inputCursorPos: Math.min(state.inputCursorPos, action.text.length) }

    case 'SET_INPUT_CURSOR_POS':
      return { ...state, inputCursorPos: action.pos }

    case 'SET_COMPOSE_NETWORKS':
      return { ...state, composeNetworks: action.networks }

    case 'SET_FILTER': {
      const next = { ...state, filter: action.filter, selectedIndex: -1 }
      return withSelection(next, 0)
    }

    case 'SET_QUERY': {
      const next = { ...state, query: action.query, selectedIndex: -1 }
      return withSelection(next, 0)
    }

    case 'SET_DIMENSIONS':
      return { ...state, rows: action.rows, cols: action.cols }
  }
}

// ==================== Components ====================

// Simple TextInput component using useInput
interface SimpleTextInputProps {
  value: string
  onChange: (value: string) => void
  onSubmit: (value: string) => void
  placeholder?: string
  focus?: boolean
  cursorPos?: number
  onCursorChange?: (pos: number) => void
}

function SimpleTextInput({
  value,
  onChange,
  onSubmit,
  placeholder,
  focus = true,
  cursorPos = 0,
  onCursorChange,
}: SimpleTextInputProps) {
  useInput(
    (input, key) => {
      if (key.return) {
        onSubmit(value)
        return
      }

      if (key.leftArrow) {
        onCursorChange?.(Math.max(0, cursorPos - 1))
        return
      }
      if (key.rightArrow) {
        onCursorChange?.(Math.min(value.length, cursorPos + 1))
        return
      }

      if (key.backspace || key.delete) {
        if (cursorPos > 0) {
          onChange(value.slice(0, cursorPos - 1) + value.slice(cursorPos))
          onCursorChange?.(cursorPos - 1)
        }
        return
      }

      // Control keys belong to the parent
      if (key.ctrl || key.meta || key.escape || key.tab || key.upArrow || key.downArrow) {
        return
      }

      if (input) {
        onChange(value.slice(0, cursorPos) + input + value.slice(cursorPos))
        onCursorChange?.(cursorPos + input.length)
      }
    },
    { isActive: focus }
  )

  const displayValue = value || placeholder || ''
  const showPlaceholder = !value && placeholder
  const charAtCursor = displayValue[cursorPos] || ' '

  return (
    <Text color={showPlaceholder ? 'gray' : 'white'}>
      {displayValue.slice(0, cursorPos)}
      <Text inverse color="cyan">
        {charAtCursor}
      </Text>
      {displayValue.slice(cursorPos + 1)}
    </Text>
  )
}

interface StatusBarProps {
  text: string
  loading?: boolean
  width: number
}

function StatusBar({ text, loading, width }: StatusBarProps) {
  const line = `${loading ? '⏳ ' : ''}${text}`
  return (
    <Box width="100%" height={1}>
      <Text inverse color="blue">
        {truncateToWidth(line, width).padEnd(width)}
      </Text>
    </Box>
  )
}

interface HelpBarProps {
  bindings: Array<{ key: string; label: string }>
}

function HelpBar({ bindings }: HelpBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text color="gray">{bindings.map(b => `${b.key}=${b.label}`).join(' · ')}</Text>
    </Box>
  )
}

interface TimelinePaneProps {
  posts: IPost[]
  selectedIndex: number
  focused: boolean
  rows: number
  width: number
}

function TimelinePane({ posts, selectedIndex, focused, rows, width }: TimelinePaneProps) {
  if (posts.length === 0) {
    return <Text color="gray">No posts. Press r to refresh.</Text>
  }

  const visibleCount = Math.max(1, Math.floor(rows / LINES_PER_POST))
  const startIndex = Math.max(0, Math.min(selectedIndex - Math.floor(visibleCount / 2), posts.length - visibleCount))
  const visible = posts.slice(startIndex, startIndex + visibleCount)

  return (
    <Box flexDirection="column">
      {visible.map((post, idx) => {
        const isSelected = startIndex + idx === selectedIndex
        const prefix = isSelected ? '▶ ' : '  '
        return (
          <Box key={post.id} flexDirection="column">
            <Text color={isSelected ? (focused ? 'green' : 'white') : platformColor(post.network)} bold={isSelected}>
              {prefix}
              {truncateToWidth(postHeader(post).split('\n').pop() ?? '', width - 2)}
            </Text>
            <Text color={isSelected ? 'white' : 'gray'}>
              {'  '}
              {preview(emojify(post.content), width - 2)}
            </Text>
            <Text color="gray">
              {'  '}
              {post.isRepost && post.repostAuthor ? `🔁 ${truncateToWidth(post.repostAuthor, 20)}  ` : ''}
              {postStats(post)}
            </Text>
          </Box>
        )
      })}
    </Box>
  )
}

interface DetailPaneProps {
  post: IPost | null
  replies: ReplyItem[]
  loadingReplies: boolean
  selectedReply: number | null
  focused: boolean
  width: number
}

function DetailPane({ post, replies, loadingReplies, selectedReply, focused, width }: DetailPaneProps) {
  if (!post) {
    return <Text color="gray">Nothing selected</Text>
  }

  return (
    <Box flexDirection="column">
      <Text color={platformColor(post.network)} bold={focused && selectedReply === null}>
        {postHeader(post)}
      </Text>
      <Box marginY={1}>
        <Text wrap="wrap">{emojify(post.content)}</Text>
      </Box>
      {post.media.length > 0 && (
        <Text color="gray">
          📎 {post.media.length} attachment{post.media.length === 1 ? '' : 's'}
          {post.media[0]?.altText ? `: ${truncateToWidth(post.media[0].altText, width - 20)}` : ''}
        </Text>
      )}
      <Text color="gray">{postStats(post)}</Text>
      {post.url && <Text color="blue">{truncateToWidth(post.url, width)}</Text>}

      <Box marginTop={1} flexDirection="column">
        {loadingReplies ? (
          <Text color="gray">Loading replies...</Text>
        ) : replies.length === 0 ? (
          <Text color="gray">No replies</Text>
        ) : (
          replies.map((item, idx) => {
            const indent = replyIndent(item.depth)
            const isSelected = focused && selectedReply === idx
            return (
              <Text key={item.post.id} color={isSelected ? 'green' : undefined} inverse={isSelected}>
                {indent}
                <Text bold>@{item.post.authorHandle}</Text> {preview(emojify(item.post.content), width - indent.length - item.post.authorHandle.length - 3)}
              </Text>
            )
          })
        )}
      </Box>
    </Box>
  )
}

interface HelpViewProps {
  onClose: () => void
}

function HelpView({ onClose }: HelpViewProps) {
  useInput((input, key) => {
    if (key.escape || key.return || input === '?' || input === 'q') {
      onClose()
    }
  })

  const lines: Array<[string, string]> = [
    ['j / k', 'Move down / up'],
    ['g / G', 'Jump to top / bottom'],
    ['Enter', 'Open replies pane'],
    ['Esc', 'Back to timeline'],
    ['r', 'Refresh timeline'],
    ['l', 'Like / unlike'],
    ['b', 'Repost / undo repost'],
    ['c', 'Compose (Tab cycles networks)'],
    ['R', 'Reply to selected post or reply'],
    ['f', 'Cycle network filter'],
    ['/', 'Search loaded posts'],
    ['o', 'Open in browser'],
    ['q', 'Quit'],
  ]

  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>Keys</Text>
      {lines.map(([key, label]) => (
        <Text key={key}>
          <Text color="cyan">{key.padEnd(8)}</Text> {label}
        </Text>
      ))}
    </Box>
  )
}

// ==================== Main App ====================

export interface AppProps {
  worker: WorkerHandle
  db: Database
  logger: Logger
  accounts: IAccount[]
  initialPosts: IPost[]
  refreshIntervalSecs: number
  onExit?: () => void
}

const COMPOSE_CYCLE: PlatformType[][] = [[...PLATFORM_TYPES], ['mastodon'], ['bluesky']]

function nextComposeNetworks(current: PlatformType[]): PlatformType[] {
  const index = COMPOSE_CYCLE.findIndex(
    networks => networks.length === current.length && networks.every(n => current.includes(n))
  )
  return COMPOSE_CYCLE[(index + 1) % COMPOSE_CYCLE.length] ?? [...PLATFORM_TYPES]
}

export function App({ worker, db, logger, accounts, initialPosts, refreshIntervalSecs, onExit }: AppProps) {
  const { exit } = useApp()
  const { stdout } = useStdout()

  const initialState: AppState = {
    timeline: {
      ...initialTimelineState,
      posts: initialPosts,
      status:
        accounts.length === 0
          ? 'No accounts configured. Add one with: npm run accounts -- add mastodon <server> <token>'
          : `${initialPosts.length} cached posts · ? for help`,
    },
    filter: 'all',
    query: '',
    selectedIndex: 0,
    selectedReply: null,
    detailPostId: null,
    focus: 'timeline',
    mode: 'normal',
    inputText: '',
    inputCursorPos: 0,
    composeNetworks: [...PLATFORM_TYPES],
    replyTo: null,
    rows: stdout?.rows || 24,
    cols: stdout?.columns || 80,
  }

  const [state, dispatch] = useReducer(reducer, initialState)
  const loadingRef = useRef(false)
  loadingRef.current = state.timeline.loading

  const posts = visiblePosts(state)
  const selectedPost = posts[state.selectedIndex] ?? null

  const send = (command: SyncCommand) => {
    worker.send(command).catch(error => {
      logger.error(`Could not queue ${command.type}`, error)
      dispatch({ type: 'SET_STATUS', text: `Error: ${errorMessage(error)}` })
    })
  }

  const requestRefresh = () => {
    if (accounts.length === 0) {
      dispatch({ type: 'SET_STATUS', text: 'No accounts configured' })
      return
    }
    dispatch({ type: 'SET_STATUS', text: 'Refreshing...', loading: true })
    send(refreshTimeline(accounts))
  }

  // Update dimensions on resize
  useEffect(() => {
    const handleResize = () => {
      if (stdout) {
        dispatch({ type: 'SET_DIMENSIONS', rows: stdout.rows, cols: stdout.columns })
      }
    }
    stdout?.on('resize', handleResize)
    return () => {
      stdout?.off('resize', handleResize)
    }
  }, [stdout])

  // Poll worker results on the redraw tick
  useEffect(() => {
    const timer = setInterval(() => {
      for (const result of worker.poll()) {
        if (result.type === 'timeline-refreshed' || result.type === 'posted') {
          db.cachePosts(result.posts).catch(error => {
            logger.warn(`Failed to cache posts: ${errorMessage(error)}`)
          })
        }
        dispatch({ type: 'RESULT', result })
      }
    }, POLL_INTERVAL_MS)
    return () => clearInterval(timer)
  }, [worker, db, logger])

  // Initial refresh, then the optional periodic one
  useEffect(() => {
    if (accounts.length === 0) return
    requestRefresh()
    if (refreshIntervalSecs <= 0) return
    const timer = setInterval(() => {
      if (!loadingRef.current) {
        send(refreshTimeline(accounts))
      }
    }, refreshIntervalSecs * 1000)
    return () => clearInterval(timer)
  }, [])

  const quit = () => {
    dispatch({ type: 'SET_STATUS', text: 'Shutting down...', loading: true })
    worker
      .shutdown()
      .catch(error => logger.error('Worker shutdown failed', error))
      .finally(() => {
        onExit?.()
        exit()
      })
  }

  const openDetail = (post: IPost) => {
    const account = findAccountForPost(accounts, post)
    dispatch({ type: 'SET_FOCUS', focus: 'detail' })
    if (!account) {
      dispatch({ type: 'SET_STATUS', text: '⚠ No matching account for this network' })
      return
    }
    dispatch({ type: 'LOAD_REPLIES', postId: post.networkId })
    send(fetchConversation(post, account))
  }

  const toggleInteraction = (post: IPost, kind: 'like' | 'repost') => {
    const account = findAccountForPost(accounts, post)
    if (!account) {
      dispatch({ type: 'SET_STATUS', text: '⚠ No matching account for this network' })
      return
    }
    if (kind === 'like') {
      dispatch({ type: 'SET_STATUS', text: post.liked ? 'Unliking...' : 'Liking...', loading: true })
      send(interact(post.liked ? 'unlike' : 'like', post, account))
    } else {
      dispatch({ type: 'SET_STATUS', text: post.reposted ? 'Undoing repost...' : 'Reposting...', loading: true })
      send(interact(post.reposted ? 'unrepost' : 'repost', post, account))
    }
  }

  // Post acted on: the selected reply in the detail pane, else the selected post
  const targetPost = (): IPost | null => {
    if (state.focus === 'detail' && state.selectedReply !== null) {
      return state.timeline.replies[state.selectedReply]?.post ?? selectedPost
    }
    return selectedPost
  }

  const submitCompose = (text: string) => {
    const content = text.trim()
    if (!content) {
      dispatch({ type: 'SET_STATUS', text: '⚠ Write something first!' })
      return
    }

    const { replyTo } = state
    if (replyTo) {
      const account = findAccountForPost(accounts, replyTo)
      if (!account) {
        dispatch({ type: 'SET_STATUS', text: '⚠ No matching account for this network' })
        return
      }
      send(submitReply(content, [account], replyTo))
    } else {
      const targets = accountsForNetworks(accounts, state.composeNetworks)
      if (targets.length === 0) {
        dispatch({ type: 'SET_STATUS', text: '⚠ No accounts for selected networks' })
        return
      }
      send(submitPost(content, targets))
    }

    dispatch({ type: 'SET_MODE', mode: 'normal' })
    dispatch({ type: 'SET_INPUT_TEXT', text: '' })
  }

  const submitSearch = (text: string) => {
    dispatch({ type: 'SET_MODE', mode: 'normal' })
    dispatch({ type: 'SET_QUERY', query: text.trim() })
    dispatch({ type: 'SET_INPUT_TEXT', text: '' })
    const count = searchPosts(filterPosts(state.timeline.posts, state.filter), text).length
    dispatch({
      type: 'SET_STATUS',
      text: text.trim() ? `✓ Found ${count} posts matching '${text.trim()}'` : 'Search cleared',
    })
  }

  useInput(
    (input, key) => {
      if (state.mode === 'compose' || state.mode === 'search') {
        if (key.escape) {
          dispatch({ type: 'SET_MODE', mode: 'normal' })
          dispatch({ type: 'SET_INPUT_TEXT', text: '' })
        } else if (key.tab && state.mode === 'compose' && !state.replyTo) {
          dispatch({ type: 'SET_COMPOSE_NETWORKS', networks: nextComposeNetworks(state.composeNetworks) })
        }
        return
      }

      if ((key.ctrl && input === 'c') || input === 'q') {
        quit()
        return
      }

      if (input === '?') {
        dispatch({ type: 'SET_MODE', mode: 'help' })
        return
      }

      // Movement
      if (input === 'j' || key.downArrow) {
        if (state.focus === 'detail' && state.timeline.replies.length > 0) {
          const next = state.selectedReply === null ? 0 : Math.min(state.selectedReply + 1, state.timeline.replies.length - 1)
          dispatch({ type: 'SELECT_REPLY', index: next })
        } else {
          dispatch({ type: 'SET_FOCUS', focus: 'timeline' })
          dispatch({ type: 'SELECT_POST', index: state.selectedIndex + 1 })
        }
        return
      }
      if (input === 'k' || key.upArrow) {
        if (state.focus === 'detail' && state.selectedReply !== null) {
          dispatch({ type: 'SELECT_REPLY', index: state.selectedReply === 0 ? null : state.selectedReply - 1 })
        } else {
          dispatch({ type: 'SET_FOCUS', focus: 'timeline' })
          dispatch({ type: 'SELECT_POST', index: state.selectedIndex - 1 })
        }
        return
      }
      if (input === 'g') {
        dispatch({ type: 'SELECT_POST', index: 0 })
        return
      }
      if (input === 'G') {
        dispatch({ type: 'SELECT_POST', index: posts.length - 1 })
        return
      }

      if (key.return) {
        if (selectedPost) openDetail(selectedPost)
        return
      }
      if (key.escape) {
        dispatch({ type: 'SET_FOCUS', focus: 'timeline' })
        dispatch({ type: 'SET_STATUS', text: '' })
        return
      }

      // Actions
      if (input === 'r') {
        if (!state.timeline.loading) requestRefresh()
        return
      }
      if (input === 'l' || input === 'b') {
        const post = targetPost()
        if (post) toggleInteraction(post, input === 'l' ? 'like' : 'repost')
        return
      }
      if (input === 'c') {
        dispatch({ type: 'OPEN_COMPOSE', replyTo: null, text: '', networks: [...PLATFORM_TYPES] })
        return
      }
      if (input === 'R') {
        const post = targetPost()
        if (post) {
          dispatch({ type: 'OPEN_COMPOSE', replyTo: post, text: `@${post.authorHandle} `, networks: [post.network] })
        }
        return
      }
      if (input === 'f') {
        const filter = nextFilter(state.filter)
        dispatch({ type: 'SET_FILTER', filter })
        dispatch({ type: 'SET_STATUS', text: `Filter: ${filterName(filter)}` })
        return
      }
      if (input === '/') {
        dispatch({ type: 'SET_MODE', mode: 'search' })
        dispatch({ type: 'SET_INPUT_TEXT', text: state.query })
        dispatch({ type: 'SET_INPUT_CURSOR_POS', pos: state.query.length })
        return
      }
      if (input === 'o') {
        const url = targetPost()?.url
        if (url) {
          openUrlInBrowser(url)
            .then(() => dispatch({ type: 'SET_STATUS', text: '✓ Opened in browser' }))
            .catch(error => dispatch({ type: 'SET_STATUS', text: `Error: ${errorMessage(error)}` }))
        }
      }
    },
    { isActive: state.mode !== 'help' }
  )

  const paneRows = Math.max(LINES_PER_POST, state.rows - 4)
  const leftWidth = Math.max(30, Math.floor(state.cols * 0.45))
  const rightWidth = Math.max(20, state.cols - leftWidth - 3)

  const header = [
    'twinfeed',
    `Filter: ${filterName(state.filter)}`,
    state.query ? `Search: ${state.query}` : null,
    `${posts.length} posts`,
    accounts.map(a => platformIcon(a.network)).join(''),
  ]
    .filter(Boolean)
    .join(' · ')

  return (
    <Box flexDirection="column" height={state.rows}>
      <Text bold color="cyan">
        {truncateToWidth(header, state.cols)}
      </Text>

      {state.mode === 'help' ? (
        <HelpView onClose={() => dispatch({ type: 'SET_MODE', mode: 'normal' })} />
      ) : (
        <Box flexGrow={1} flexDirection="row">
          <Box width={leftWidth} flexDirection="column" paddingX={1}>
            <TimelinePane
              posts={posts}
              selectedIndex={state.selectedIndex}
              focused={state.focus === 'timeline'}
              rows={paneRows}
              width={leftWidth - 2}
            />
          </Box>
          <Box width={rightWidth} flexDirection="column" paddingX={1} marginLeft={1}>
            <DetailPane
              post={selectedPost}
              replies={state.timeline.replies}
              loadingReplies={state.timeline.loadingReplies}
              selectedReply={state.selectedReply}
              focused={state.focus === 'detail'}
              width={rightWidth - 2}
            />
          </Box>
        </Box>
      )}

      {(state.mode === 'compose' || state.mode === 'search') && (
        <Box>
          <Text color="yellow">
            {state.mode === 'search'
              ? '/ '
              : state.replyTo
                ? `↩ ${platformName(state.replyTo.network)} `
                : `✎ ${state.composeNetworks.map(platformName).join('+')} `}
          </Text>
          <SimpleTextInput
            value={state.inputText}
            onChange={text => dispatch({ type: 'SET_INPUT_TEXT', text })}
            onSubmit={state.mode === 'search' ? submitSearch : submitCompose}
            placeholder={state.mode === 'search' ? 'Search posts' : 'What is happening?'}
            cursorPos={state.inputCursorPos}
            onCursorChange={pos => dispatch({ type: 'SET_INPUT_CURSOR_POS', pos })}
          />
        </Box>
      )}

      <StatusBar text={state.timeline.status} loading={state.timeline.loading} width={state.cols} />
      <HelpBar
        bindings={
          state.mode === 'compose'
            ? [
                { key: 'Enter', label: 'send' },
                { key: 'Tab', label: 'networks' },
                { key: 'Esc', label: 'cancel' },
              ]
            : [
                { key: 'r', label: 'refresh' },
                { key: 'l', label: 'like' },
                { key: 'b', label: 'boost' },
                { key: 'c', label: 'compose' },
                { key: 'R', label: 'reply' },
                { key: '?', label: 'help' },
                { key: 'q', label: 'quit' },
              ]
        }
      />
    </Box>
  )
}

export function renderApp(props: AppProps) {
  return render(<App {...props} />)
}
